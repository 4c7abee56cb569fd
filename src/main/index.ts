/**
 * Entry point
 * Loads the locations and hands the bridge to whatever renders them
 */
import { initialize } from './core';

export * from './core';
export * from './bridge';
export * from './modules/locations';
export * from './error/app.error';
export type { Location, LocationSource } from '../@types/location';
export type { LocationsAPI, AppErrorPayload } from '../@types';

if (require.main === module) {
  const { shutdown } = initialize();
  process.once('beforeExit', shutdown);
}
