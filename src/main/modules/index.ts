/**
 * Modules index file
 * Initializes all feature modules
 */
import { getLogger } from '../logging';
import { locationStore } from './locations';
import type { LoadResult, LocationStore } from './locations';

const logger = getLogger('Modules');

/**
 * Initialize all modules
 */
export function initializeModules(store: LocationStore = locationStore): LoadResult {
  logger.info('Initializing all modules');

  const result = store.load();

  logger.info('All modules initialized');
  return result;
}

export default {
  initialize: initializeModules
};
