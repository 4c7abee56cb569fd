/**
 * Locations module index file
 */
import { LocationModel, locationSchema, locationListSchema } from './location.model';
import { LocationStore, locationStore } from './location.store';

export type { DecodeResult } from './location.model';
export type {
  LoadResult,
  SaveResult,
  ToggleResult,
  LocationStoreEvents,
  LocationStoreOptions,
} from './location.store';

export {
  LocationModel,
  LocationStore,
  locationSchema,
  locationListSchema,
  locationStore
};

export default {
  model: LocationModel,
  store: locationStore
};
