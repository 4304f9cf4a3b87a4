import { access, constants, stat } from 'node:fs/promises';
import path from 'node:path';
import { types } from 'node:util';
import { logger } from '../utils/logger';

export const WAKEONLAN_COMMAND = 'wakeonlan';

// Searched after PATH; service managers and Termux often start the gateway with a bare PATH.
export const FALLBACK_COMMAND_DIRECTORIES = [
  '/usr/local/sbin',
  '/usr/local/bin',
  '/usr/sbin',
  '/usr/bin',
  '/sbin',
  '/bin',
  '/opt/homebrew/bin',
  '/data/data/com.termux/files/usr/bin',
];

/**
 * Ordered, de-duplicated list of paths where `command` may live.
 */
export function commandCandidates(
  command: string,
  pathValue: string = process.env.PATH ?? '',
  fallbackDirectories: readonly string[] = FALLBACK_COMMAND_DIRECTORIES
): string[] {
  const directories = [
    ...pathValue.split(path.delimiter).filter((directory) => directory.length > 0),
    ...fallbackDirectories,
  ];

  return [...new Set(directories)].map((directory) => path.join(directory, command));
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stats = await stat(candidate);
    if (!stats.isFile()) {
      return false;
    }
    await access(candidate, constants.X_OK);
    return true;
  } catch (error) {
    const code = types.isNativeError(error) && 'code' in error ? String(error.code) : 'UNKNOWN';
    logger.debug(`Command candidate ${candidate} is not usable`, { code });
    return false;
  }
}

/**
 * Returns the first candidate that is an executable file, or null.
 */
export async function locateCommand(candidates: readonly string[]): Promise<string | null> {
  for (const candidate of candidates) {
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

export function locateWakeCommand(): Promise<string | null> {
  return locateCommand(commandCandidates(WAKEONLAN_COMMAND));
}
