/**
 * Locations bridge
 * Exposes a minimal API to the renderer: read the list, toggle one entry,
 * and listen for changes. The renderer never receives the store itself.
 */
import { EventEmitter } from 'events';
import { getLogger } from '../logging';
import { toErrorPayload } from '../error';
import type { ErrorNotifier } from '../error';
import type { LocationStore } from '../modules/locations';
import type { AppErrorPayload, LocationsAPI } from '../../@types';
import { EVENTS } from './channels';

const logger = getLogger('LocationsBridge');

export interface LocationsBridge {
  api: LocationsAPI;
  /** Push an error that did not come from the store to renderer listeners */
  notifyError: ErrorNotifier;
  /** Detach from the store and drop every renderer listener */
  dispose: () => void;
}

export function createLocationsBridge(store: LocationStore): LocationsBridge {
  const events = new EventEmitter();

  const detachUpdates = store.subscribe(locations => {
    events.emit(EVENTS.LOCATIONS_UPDATED, locations);
  });
  const detachErrors = store.onError(error => {
    events.emit(EVENTS.APP_ERROR, toErrorPayload(error));
  });

  const api: LocationsAPI = {
    getLocations: () => store.getLocations(),

    getLocation: (id: number) => store.getLocationById(id),

    toggleCompletion: (id: number) => {
      logger.debug(`Bridge: toggleCompletion called for ${id}`);
      return store.toggleCompletion(id).status === 'toggled';
    },

    onLocationsUpdated: callback => {
      events.on(EVENTS.LOCATIONS_UPDATED, callback);
      return () => {
        events.off(EVENTS.LOCATIONS_UPDATED, callback);
      };
    },

    onAppError: callback => {
      events.on(EVENTS.APP_ERROR, callback);
      return () => {
        events.off(EVENTS.APP_ERROR, callback);
      };
    }
  };

  return {
    api,
    notifyError: (error: AppErrorPayload) => {
      events.emit(EVENTS.APP_ERROR, error);
    },
    dispose: () => {
      logger.info('Disposing locations bridge');
      detachUpdates();
      detachErrors();
      events.removeAllListeners();
    }
  };
}
