/**
 * Bridge events
 * Names of the events pushed from the store side to the renderer
 */
export const EVENTS = {
  LOCATIONS_UPDATED: 'locations-updated',
  APP_ERROR: 'app-error'
} as const;
