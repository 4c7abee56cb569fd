/**
 * Location store
 * Owns the in-memory list of locations and its JSON snapshot on disk
 */
import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import configService from '../../config';
import { getLogger } from '../../logging';
import { handleError, toError } from '../../error';
import {
  ConfigError,
  DecodeFailureError,
  ReadFailureError,
  StorageError,
  StorageUnavailableError,
  WriteFailureError,
} from '../../error/app.error';
import { LocationModel } from './location.model';
import type { Location, LocationSource } from '../../../@types/location';

const logger = getLogger('LocationStore');

export interface LocationStoreOptions {
  /** Per-user persisted file. Defaults to the configured data path. */
  dataPath?: string;
  /** Read-only fallback used when the persisted file is absent. */
  seedPath?: string;
}

export type LoadResult =
  | { ok: true; source: LocationSource; count: number }
  | { ok: false; error: StorageError };

export type SaveResult =
  | { ok: true; path: string; count: number }
  | { ok: false; error: StorageError };

export type ToggleResult =
  | { status: 'toggled'; location: Location; save: SaveResult }
  | { status: 'not-found'; id: number };

/**
 * Location store events
 */
export interface LocationStoreEvents {
  'locations-updated': (locations: readonly Location[]) => void;
  'storage-error': (error: StorageError) => void;
}

const UPDATED = 'locations-updated';
const STORAGE_ERROR = 'storage-error';

type PathResult = { ok: true; path: string } | { ok: false; error: StorageError };

/**
 * Location store class
 * All operations are synchronous and never throw; failures are logged,
 * emitted as 'storage-error' and returned to the caller.
 */
export class LocationStore extends EventEmitter {
  private locations: Location[] = [];
  private source: LocationSource | null = null;
  private readonly options: LocationStoreOptions;

  constructor(options: LocationStoreOptions = {}) {
    super();
    this.options = options;
  }

  /**
   * Populate the list from the persisted file, or from the seed when there is none.
   * A persisted file that fails to read or decode is reported; the seed is not tried.
   */
  public load(): LoadResult {
    const dataPath = this.resolveDataPath();
    if (!dataPath.ok) {
      return this.loadFailed(dataPath.error);
    }

    let persisted: boolean;
    try {
      persisted = this.fileExists(dataPath.path);
    } catch (error) {
      return this.loadFailed(new StorageUnavailableError(
        `Cannot access data directory: ${toError(error).message}`,
        path.dirname(dataPath.path),
        error
      ));
    }

    if (persisted) {
      logger.info(`Loading locations from ${dataPath.path}`);
      return this.loadFrom(dataPath.path, 'persisted');
    }

    const seedPath = this.resolveSeedPath();
    if (!seedPath.ok) {
      return this.loadFailed(seedPath.error);
    }

    logger.info(`No persisted locations found, loading seed from ${seedPath.path}`);
    return this.loadFrom(seedPath.path, 'seed');
  }

  /**
   * Write the whole list to the persisted file.
   * The snapshot goes to a temporary file first and is renamed over the target.
   */
  public save(): SaveResult {
    const dataPath = this.resolveDataPath();
    if (!dataPath.ok) {
      return this.saveFailed(dataPath.error);
    }

    const dirPath = path.dirname(dataPath.path);
    try {
      fs.mkdirSync(dirPath, { recursive: true });
    } catch (error) {
      return this.saveFailed(new StorageUnavailableError(
        `Cannot create data directory: ${toError(error).message}`,
        dirPath,
        error
      ));
    }

    const tempPath = `${dataPath.path}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tempPath, LocationModel.encodeList(this.locations), 'utf8');
      fs.renameSync(tempPath, dataPath.path);
    } catch (error) {
      this.removeTempFile(tempPath);
      return this.saveFailed(new WriteFailureError(
        `Failed to save locations: ${toError(error).message}`,
        dataPath.path,
        error
      ));
    }

    logger.debug(`Saved ${this.locations.length} locations to ${dataPath.path}`);
    return { ok: true, path: dataPath.path, count: this.locations.length };
  }

  /**
   * Flip a location's completion flag and persist the list.
   * Unknown ids leave both the list and the file untouched.
   */
  public toggleCompletion(id: number): ToggleResult {
    const index = this.locations.findIndex(location => location.id === id);

    if (index === -1) {
      logger.warn(`Location with id ${id} not found for toggle`);
      return { status: 'not-found', id };
    }

    const updated = LocationModel.toggled(this.locations[index]);
    this.locations[index] = updated;
    logger.info(`Toggling location ${id} to ${updated.isCompleted ? 'completed' : 'not completed'}`);

    const save = this.save();
    this.notify(UPDATED, this.getLocations());

    return { status: 'toggled', location: LocationModel.normalize(updated), save };
  }

  /**
   * Snapshot of the current list. Mutating it does not affect the store.
   */
  public getLocations(): readonly Location[] {
    return this.locations.map(location => LocationModel.normalize(location));
  }

  public getLocationById(id: number): Location | undefined {
    const location = this.locations.find(candidate => candidate.id === id);
    return location ? LocationModel.normalize(location) : undefined;
  }

  /**
   * Source of the current list, or null before a successful load
   */
  public getSource(): LocationSource | null {
    return this.source;
  }

  /**
   * Listen for list changes. Returns a function that removes the listener.
   */
  public subscribe(listener: LocationStoreEvents['locations-updated']): () => void {
    this.on(UPDATED, listener);
    return () => {
      this.off(UPDATED, listener);
    };
  }

  /**
   * Listen for storage failures. Returns a function that removes the listener.
   */
  public onError(listener: LocationStoreEvents['storage-error']): () => void {
    this.on(STORAGE_ERROR, listener);
    return () => {
      this.off(STORAGE_ERROR, listener);
    };
  }

  private loadFrom(filePath: string, source: LocationSource): LoadResult {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      return this.loadFailed(new ReadFailureError(
        `Failed to read ${source} locations: ${toError(error).message}`,
        filePath,
        error
      ));
    }

    const decoded = LocationModel.decodeList(content);
    if (!decoded.ok) {
      return this.loadFailed(new DecodeFailureError(
        `Failed to decode ${source} locations: ${decoded.reason}`,
        filePath
      ));
    }

    this.locations = decoded.locations;
    this.source = source;
    logger.info(`Loaded ${this.locations.length} locations from ${source} file`);
    this.notify(UPDATED, this.getLocations());

    return { ok: true, source, count: this.locations.length };
  }

  // ENOENT and ENOTDIR mean "no file"; anything else means the directory is unusable
  private fileExists(filePath: string): boolean {
    try {
      fs.statSync(filePath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return false;
      }
      throw error;
    }
  }

  private resolveDataPath(): PathResult {
    if (this.options.dataPath) {
      return { ok: true, path: this.options.dataPath };
    }
    try {
      return { ok: true, path: configService.getDataPath() };
    } catch (error) {
      if (error instanceof ConfigError) {
        return { ok: false, error: new StorageUnavailableError(error.message, '', error) };
      }
      throw error;
    }
  }

  private resolveSeedPath(): PathResult {
    if (this.options.seedPath) {
      return { ok: true, path: this.options.seedPath };
    }
    try {
      return { ok: true, path: configService.getSeedPath() };
    } catch (error) {
      if (error instanceof ConfigError) {
        return { ok: false, error: new ReadFailureError(error.message, '', error) };
      }
      throw error;
    }
  }

  private removeTempFile(tempPath: string): void {
    try {
      fs.rmSync(tempPath, { force: true });
    } catch (error) {
      logger.warn(`Failed to remove temporary file ${tempPath}`, error);
    }
  }

  private loadFailed(error: StorageError): LoadResult {
    this.report(error);
    return { ok: false, error };
  }

  private saveFailed(error: StorageError): SaveResult {
    this.report(error);
    return { ok: false, error };
  }

  private report(error: StorageError): void {
    handleError(error);
    this.notify(STORAGE_ERROR, error);
  }

  // Listener failures are logged, never rethrown into the store operation
  private notify<K extends keyof LocationStoreEvents>(
    event: K,
    payload: Parameters<LocationStoreEvents[K]>[0]
  ): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      logger.error(`Listener for '${event}' failed`);
      handleError(toError(error));
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

// Export as singleton
export const locationStore = new LocationStore();
export default locationStore;
