/**
 * @module json-file-store
 * {@link InMemoryTripStore} persisted to a single JSON document.
 *
 * The file is rewritten after every mutation: the new content goes to
 * `<file>.tmp` first and is renamed over the target. A write failure rolls
 * the mutation back.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { ZodError } from 'zod';
import type { StoreSnapshot } from '@trip-planner/types';
import { StoreFailure, errorMessage } from './errors';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { InMemoryTripStore, emptySnapshot } from './memory-store';
import { parseStoreSnapshot } from './store-snapshot';

/**
 * Read and validate a store document. A missing file yields an empty store.
 *
 * @throws StoreFailure if the file cannot be read, is not JSON, or fails validation.
 */
export function readStoreFile(path: string): StoreSnapshot {
  if (!existsSync(path)) return emptySnapshot();

  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new StoreFailure(`Cannot read store file ${path}: ${errorMessage(error)}`, { path }, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new StoreFailure(`Store file ${path} is not valid JSON`, { path }, { cause: error });
  }

  try {
    return parseStoreSnapshot(json);
  } catch (error) {
    const issues =
      error instanceof ZodError
        ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        : [errorMessage(error)];
    throw new StoreFailure(`Store file ${path} is malformed`, { path, issues }, { cause: error });
  }
}

export class JsonFileTripStore extends InMemoryTripStore {
  /**
   * @param path     - Location of the store document.
   * @param snapshot - Contents already loaded from `path`.
   */
  constructor(
    readonly path: string,
    snapshot: StoreSnapshot,
    private readonly logger: Logger = silentLogger(),
  ) {
    super(snapshot);
  }

  /** Load `path` (or start empty when it does not exist yet). */
  static open(path: string, logger: Logger = silentLogger()): JsonFileTripStore {
    const snapshot = readStoreFile(path);
    logger.debug(
      { path, trips: snapshot.trips.length, sequences: snapshot.sequences },
      'store loaded',
    );
    return new JsonFileTripStore(path, snapshot, logger);
  }

  protected override persist(): void {
    const tmp = `${this.path}.tmp`;
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(tmp, `${JSON.stringify(this.snapshot(), null, 2)}\n`, 'utf8');
    renameSync(tmp, this.path);
    this.logger.trace({ path: this.path }, 'store persisted');
  }
}
