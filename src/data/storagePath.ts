/**
 * @fileoverview Default location of the history document
 * @module data/storagePath
 *
 * Per-user, per-application data directory:
 * - Windows: %APPDATA%\<app>
 * - macOS: ~/Library/Application Support/<app>
 * - Others: $XDG_DATA_HOME/<app>, falling back to ~/.local/share/<app>
 */

import os from 'node:os';
import path from 'node:path';
import type { AppConfig } from '../core/AppConfig';
import { HISTORY_FILE_NAME } from '../core/Constants';

/**
 * Host facts the resolver depends on
 */
export interface PathEnvironment {
  platform: NodeJS.Platform;
  homeDir: string;
  env: NodeJS.ProcessEnv;
}

function currentEnvironment(): PathEnvironment {
  return { platform: process.platform, homeDir: os.homedir(), env: process.env };
}

/**
 * Per-user data directory for an application
 */
export function resolveAppDataDirectory(
  appName: string,
  environment: PathEnvironment = currentEnvironment()
): string {
  const { platform, homeDir, env } = environment;

  if (platform === 'win32') {
    const base = env.APPDATA || path.win32.join(homeDir, 'AppData', 'Roaming');
    return path.win32.join(base, appName);
  }

  if (platform === 'darwin') {
    return path.posix.join(homeDir, 'Library', 'Application Support', appName);
  }

  const base = env.XDG_DATA_HOME || path.posix.join(homeDir, '.local', 'share');
  return path.posix.join(base, appName);
}

/**
 * Build the path resolver handed to PersistenceService.
 * An explicit historyFilePath wins over the per-user directory.
 */
export function createHistoryPathResolver(
  config: Pick<AppConfig, 'appName' | 'historyFilePath'>,
  environment?: PathEnvironment
): () => string {
  return () => {
    if (config.historyFilePath) {
      return path.resolve(config.historyFilePath);
    }
    const host = environment ?? currentEnvironment();
    const directory = resolveAppDataDirectory(config.appName, host);
    const join = host.platform === 'win32' ? path.win32.join : path.posix.join;
    return join(directory, HISTORY_FILE_NAME);
  };
}
