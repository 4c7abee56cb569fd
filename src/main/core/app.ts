/**
 * App Core
 * Manages the application lifecycle
 */
import rootLogger, { getLogger } from '../logging';
import { handleError, toError } from '../error';
import { initializeModules } from '../modules';
import { locationStore } from '../modules/locations';
import type { LoadResult, LocationStore } from '../modules/locations';
import { createLocationsBridge } from '../bridge';
import type { LocationsBridge } from '../bridge';

const logger = getLogger('AppCore');

export interface AppContext {
  bridge: LocationsBridge;
  loadResult: LoadResult;
  /** Remove process handlers and detach the bridge */
  shutdown: () => void;
}

/**
 * Initialize the app
 */
export function initialize(store: LocationStore = locationStore): AppContext {
  logger.info('Initializing application');

  const logFile = rootLogger.getLogFilePath();
  if (logFile) {
    logger.info(`Writing logs to ${logFile}`);
  }

  // Bridge first so renderer listeners see the initial load
  const bridge = createLocationsBridge(store);
  const loadResult = initializeModules(store);

  if (loadResult.ok) {
    const locations = store.getLocations();
    const completed = locations.filter(location => location.isCompleted).length;
    logger.info(`App ready: ${completed}/${locations.length} locations completed (source: ${loadResult.source})`);
  } else {
    logger.warn(`App ready without locations: ${loadResult.error.code}`);
  }

  const onUncaughtException = (error: Error): void => {
    handleError(error, bridge.notifyError);
  };
  const onUnhandledRejection = (reason: unknown): void => {
    handleError(toError(reason), bridge.notifyError);
  };

  process.on('uncaughtException', onUncaughtException);
  process.on('unhandledRejection', onUnhandledRejection);

  return {
    bridge,
    loadResult,
    shutdown: () => {
      logger.info('App quitting, cleaning up resources');
      process.off('uncaughtException', onUncaughtException);
      process.off('unhandledRejection', onUnhandledRejection);
      bridge.dispose();
      logger.info('Cleanup complete');
    }
  };
}
