import { execFile as execFileCallback } from 'node:child_process';
import { promisify, types } from 'node:util';
import * as wakeOnLan from 'wake_on_lan';
import type { WakeSenderMode } from '../config';
import type { DispatchResult, ServerEntry } from '../types';
import { logger } from '../utils/logger';
import { locateWakeCommand } from './commandLocator';

const execFile = promisify(execFileCallback);

const COMMAND_MAX_BUFFER_BYTES = 64 * 1024;

export const WAKEONLAN_INSTALL_HINT =
  'Install the wakeonlan utility (apt install wakeonlan, brew install wakeonlan or pkg install wakeonlan) ' +
  'or set WOL_SENDER=auto to fall back to the built-in sender.';

export interface WakeDispatcherOptions {
  mode: WakeSenderMode;
  commandTimeoutMs: number;
  locateCommand?: () => Promise<string | null>;
}

type CommandFailure = Error & {
  code?: number | string;
  signal?: NodeJS.Signals | null;
  killed?: boolean;
  stderr?: string | Buffer;
};

function isCommandFailure(error: unknown): error is CommandFailure {
  return types.isNativeError(error);
}

function stderrText(stderr: string | Buffer | undefined): string {
  if (stderr === undefined) {
    return '';
  }
  return (typeof stderr === 'string' ? stderr : stderr.toString('utf-8')).trim();
}

/**
 * Maps an execFile rejection onto the dispatch error taxonomy.
 */
export function classifyCommandError(error: unknown): DispatchResult {
  if (!isCommandFailure(error)) {
    return { ok: false, kind: 'UNEXPECTED', message: String(error) };
  }

  if (error.code === 'ENOENT') {
    return {
      ok: false,
      kind: 'CAPABILITY_MISSING',
      message: `wakeonlan command could not be executed. ${WAKEONLAN_INSTALL_HINT}`,
    };
  }

  if (typeof error.code === 'number') {
    const stderr = stderrText(error.stderr);
    return {
      ok: false,
      kind: 'TRANSMISSION_FAILED',
      message: stderr
        ? `wakeonlan exited with code ${error.code}: ${stderr}`
        : `wakeonlan exited with code ${error.code}`,
    };
  }

  if (error.killed || error.signal) {
    return {
      ok: false,
      kind: 'UNEXPECTED',
      message: `wakeonlan was terminated (${error.signal ?? 'timeout'})`,
    };
  }

  return { ok: false, kind: 'UNEXPECTED', message: error.message };
}

/**
 * Wake Dispatcher
 * Sends one magic packet per call through the wakeonlan command or the wake_on_lan library.
 * Success means the packet left this host; it says nothing about the target booting.
 */
export class WakeDispatcher {
  private readonly locate: () => Promise<string | null>;

  constructor(private readonly options: WakeDispatcherOptions) {
    this.locate = options.locateCommand ?? locateWakeCommand;
  }

  async dispatch(entry: ServerEntry): Promise<DispatchResult> {
    const result = await this.send(entry);

    if (result.ok) {
      logger.info(`Sent WoL magic packet to ${entry.name} (${entry.macAddress})`, {
        serverId: entry.id,
        broadcastAddress: entry.broadcastAddress,
        via: result.via,
      });
    } else {
      logger.error(`Failed to send WoL magic packet to ${entry.name}`, {
        serverId: entry.id,
        kind: result.kind,
        error: result.message,
      });
    }

    return result;
  }

  private async send(entry: ServerEntry): Promise<DispatchResult> {
    if (this.options.mode === 'library') {
      return this.sendWithLibrary(entry);
    }

    let commandPath: string | null;
    try {
      commandPath = await this.locate();
    } catch (error) {
      return {
        ok: false,
        kind: 'UNEXPECTED',
        message: error instanceof Error ? error.message : String(error),
      };
    }

    if (commandPath) {
      return this.sendWithCommand(commandPath, entry);
    }

    if (this.options.mode === 'command') {
      return {
        ok: false,
        kind: 'CAPABILITY_MISSING',
        message: `wakeonlan command not found. ${WAKEONLAN_INSTALL_HINT}`,
      };
    }

    logger.debug('wakeonlan command not found, using the wake_on_lan library');
    return this.sendWithLibrary(entry);
  }

  private async sendWithCommand(commandPath: string, entry: ServerEntry): Promise<DispatchResult> {
    try {
      await execFile(commandPath, ['-i', entry.broadcastAddress, entry.macAddress], {
        timeout: this.options.commandTimeoutMs,
        maxBuffer: COMMAND_MAX_BUFFER_BYTES,
      });
      return { ok: true, via: 'command' };
    } catch (error) {
      return classifyCommandError(error);
    }
  }

  private async sendWithLibrary(entry: ServerEntry): Promise<DispatchResult> {
    try {
      await new Promise<void>((resolve, reject) => {
        wakeOnLan.wake(entry.macAddress, { address: entry.broadcastAddress }, (error: unknown) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
      return { ok: true, via: 'library' };
    } catch (error) {
      if (types.isNativeError(error)) {
        return { ok: false, kind: 'TRANSMISSION_FAILED', message: error.message };
      }
      return { ok: false, kind: 'UNEXPECTED', message: String(error) };
    }
  }
}
