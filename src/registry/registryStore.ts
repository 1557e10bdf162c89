/**
 * Registry Store
 *
 * Owns the published ClientRegistry snapshot. A snapshot is built in full
 * (parse + index) before it is published, so readers only ever see a
 * complete registry. Reloading builds a new snapshot and swaps the
 * reference; resolutions already holding the old snapshot finish on it.
 */

import { readFile } from 'fs/promises';
import { AppError, RegistryFormatError } from '../utils/AppError';
import { Logging } from '../utils/logger';
import { ClientRegistry } from './clientRegistry';
import { parseRegistry } from './parseRegistry';

/** A path to a registry JSON file, or an already-parsed JSON value */
export type RegistrySource = string | { readonly data: unknown };

async function readSource(source: RegistrySource): Promise<unknown> {
  if (typeof source !== 'string') {
    return source.data;
  }

  let text: string;
  try {
    text = await readFile(source, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AppError(`Unable to read client registry ${source}: ${reason}`, 500, false);
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new RegistryFormatError(`Client registry ${source} is not valid JSON`);
  }
}

/**
 * Parses and indexes a snapshot without publishing it.
 */
export async function buildRegistry(source: RegistrySource): Promise<ClientRegistry> {
  const { metadata, records } = parseRegistry(await readSource(source));
  const registry = new ClientRegistry(records, metadata);

  Logging.debug({ message: 'Client registry built', ...registry.stats() });

  return registry;
}

export class RegistryStore {
  private active: ClientRegistry | undefined;
  private pending: Promise<ClientRegistry> | undefined;

  /**
   * Loads the registry once. Later calls return the published snapshot
   * without re-reading the source; use reload() to replace it.
   */
  async load(source: RegistrySource): Promise<ClientRegistry> {
    if (this.active) {
      return this.active;
    }

    if (!this.pending) {
      this.pending = buildRegistry(source)
        .then((registry) => {
          // A reload that finished first has already published a newer snapshot
          if (!this.active) {
            this.active = registry;
          }
          return this.active;
        })
        .finally(() => {
          this.pending = undefined;
        });
    }

    return this.pending;
  }

  /**
   * Builds a fresh snapshot and publishes it. On failure the previous
   * snapshot stays active.
   */
  async reload(source: RegistrySource): Promise<ClientRegistry> {
    const next = await buildRegistry(source);
    this.active = next;
    Logging.info(`Client registry reloaded (${next.size} clients)`);
    return next;
  }

  current(): ClientRegistry {
    if (!this.active) {
      throw AppError.serviceUnavailable('Client registry has not been loaded');
    }
    return this.active;
  }

  isLoaded(): boolean {
    return this.active !== undefined;
  }

  /** Drops the published snapshot */
  clear(): void {
    this.active = undefined;
  }
}

// Process-wide store used by the HTTP layer and the run script
export const registryStore = new RegistryStore();

export default registryStore;
