import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { types } from 'node:util';
import {
  DEFAULT_MONITOR_PORT,
  RegistryDocument,
  RegistrySnapshot,
  ServerEntry,
  ServerInput,
  StoredServer,
} from '../types';
import { logger } from '../utils/logger';
import { parseRegistryDocument } from '../validators/serverValidator';
import { appendBootSample as appendToHistory } from './bootTimeEstimator';

export type RegistryErrorCode = 'CONFIG_MISSING' | 'CONFIG_INVALID' | 'LAST_SERVER';

export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: RegistryErrorCode,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'RegistryError';
    Object.setPrototypeOf(this, RegistryError.prototype);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return types.isNativeError(error) && 'code' in error;
}

function toServerEntry(stored: StoredServer, id: number): ServerEntry {
  return {
    id,
    name: stored.NAME,
    macAddress: stored.WOL_MAC_ADDRESS,
    broadcastAddress: stored.BROADCAST_ADDRESS,
    redirectUrl: stored.SITE_URL,
    waitSeconds: stored.WAIT_TIME_SECONDS,
    monitorAddress: stored.MONITOR_IP,
    monitorPort: stored.MONITOR_PORT ?? DEFAULT_MONITOR_PORT,
    locked: stored.LOCKED,
    pin: stored.PIN,
    bootHistory: [...stored.BOOT_HISTORY],
  };
}

function toStoredServer(input: ServerInput, bootHistory: number[]): StoredServer {
  return {
    NAME: input.name,
    WOL_MAC_ADDRESS: input.macAddress,
    BROADCAST_ADDRESS: input.broadcastAddress,
    SITE_URL: input.redirectUrl,
    WAIT_TIME_SECONDS: input.waitSeconds,
    MONITOR_IP: input.monitorAddress,
    MONITOR_PORT: input.monitorPort,
    LOCKED: input.locked,
    PIN: input.pin,
    BOOT_HISTORY: bootHistory,
  };
}

function cloneDocument(document: RegistryDocument): RegistryDocument {
  return {
    PORT: document.PORT,
    SERVERS: document.SERVERS.map((server) => ({
      ...server,
      BOOT_HISTORY: [...server.BOOT_HISTORY],
    })),
  };
}

/**
 * Server Registry
 * Holds the ordered server list loaded from the JSON registry document.
 * Every mutation is queued and written atomically (temp file + rename) before
 * the in-memory copy is replaced.
 */
export class ServerRegistry {
  private document: RegistryDocument | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async load(): Promise<RegistrySnapshot> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new RegistryError(`Registry file not found: ${this.filePath}`, 'CONFIG_MISSING');
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown parse error';
      throw new RegistryError(`Registry file is not valid JSON: ${message}`, 'CONFIG_INVALID');
    }

    const result = parseRegistryDocument(parsed);
    if (!result.ok) {
      const location = result.field ? `${result.field}: ` : '';
      throw new RegistryError(
        `Invalid registry document (${location}${result.reason})`,
        'CONFIG_INVALID',
        result.field
      );
    }

    this.document = result.value.document;
    if (result.value.upgraded) {
      logger.info('Upgraded legacy single-server registry document; it is rewritten on the next save', {
        path: this.filePath,
      });
    }
    logger.info('Server registry loaded', {
      path: this.filePath,
      servers: this.document.SERVERS.length,
      port: this.document.PORT,
    });

    return this.snapshot();
  }

  snapshot(): RegistrySnapshot {
    return { port: this.getPort(), servers: this.list() };
  }

  list(): ServerEntry[] {
    return this.requireDocument().SERVERS.map(toServerEntry);
  }

  get(id: number): ServerEntry | undefined {
    const servers = this.requireDocument().SERVERS;
    if (!Number.isInteger(id) || id < 0 || id >= servers.length) {
      return undefined;
    }

    return toServerEntry(servers[id], id);
  }

  getPort(): number {
    return this.requireDocument().PORT;
  }

  count(): number {
    return this.requireDocument().SERVERS.length;
  }

  /**
   * Appends one boot-time sample; false when the id no longer exists.
   */
  appendBootSample(id: number, seconds: number): Promise<boolean> {
    return this.mutate(
      (draft) => {
        const server = Number.isInteger(id) ? draft.SERVERS[id] : undefined;
        if (!server) {
          return false;
        }
        server.BOOT_HISTORY = appendToHistory(server.BOOT_HISTORY, seconds);
        return true;
      },
      (recorded) => recorded
    );
  }

  addServer(input: ServerInput): Promise<ServerEntry> {
    return this.mutate((draft) => {
      const stored = toStoredServer(input, []);
      draft.SERVERS.push(stored);
      return toServerEntry(stored, draft.SERVERS.length - 1);
    });
  }

  /**
   * Replaces a server's definition; its boot history is kept.
   */
  updateServer(id: number, input: ServerInput): Promise<ServerEntry | undefined> {
    return this.mutate(
      (draft) => {
        const existing = Number.isInteger(id) ? draft.SERVERS[id] : undefined;
        if (!existing) {
          return undefined;
        }
        const stored = toStoredServer(input, existing.BOOT_HISTORY);
        draft.SERVERS[id] = stored;
        return toServerEntry(stored, id);
      },
      (updated) => updated !== undefined
    );
  }

  /**
   * Removes a server. Later servers move down one id.
   */
  deleteServer(id: number): Promise<ServerEntry | undefined> {
    return this.mutate(
      (draft) => {
        const existing = Number.isInteger(id) ? draft.SERVERS[id] : undefined;
        if (!existing) {
          return undefined;
        }
        if (draft.SERVERS.length <= 1) {
          throw new RegistryError('At least one server must stay configured', 'LAST_SERVER');
        }
        draft.SERVERS.splice(id, 1);
        return toServerEntry(existing, id);
      },
      (removed) => removed !== undefined
    );
  }

  /**
   * Writes the current document as-is (used to persist a legacy upgrade).
   */
  save(): Promise<void> {
    return this.mutate(() => undefined);
  }

  /**
   * Resolves once every queued write has settled.
   */
  flush(): Promise<void> {
    return this.writeQueue;
  }

  private requireDocument(): RegistryDocument {
    if (!this.document) {
      throw new Error('Server registry not loaded. Call load() first.');
    }
    return this.document;
  }

  private mutate<T>(
    mutator: (draft: RegistryDocument) => T,
    shouldPersist: (result: T) => boolean = () => true
  ): Promise<T> {
    const task = async (): Promise<T> => {
      const draft = cloneDocument(this.requireDocument());
      const result = mutator(draft);
      if (!shouldPersist(result)) {
        return result;
      }

      await this.writeDocument(draft);
      this.document = draft;
      return result;
    };

    const run = () => Promise.resolve().then(task);
    const result = this.writeQueue.then(run, run);
    this.writeQueue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async writeDocument(document: RegistryDocument): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
      await rename(tempPath, this.filePath);
      logger.debug('Server registry saved', { path: this.filePath });
    } catch (error) {
      logger.error('Failed to save server registry', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
