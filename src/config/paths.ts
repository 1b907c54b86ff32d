import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import { env } from './env.js';

export const APP_NAME = 'streamwatch';
export const APP_VERSION = '1.0.0';

/**
 * Per-user directory holding settings.json, config.json and logs.
 */
export function getAppDataDir(platform: NodeJS.Platform = process.platform): string {
  if (env.STREAMWATCH_HOME) {
    return path.resolve(env.STREAMWATCH_HOME);
  }

  if (platform === 'win32' && process.env.APPDATA) {
    return path.join(process.env.APPDATA, APP_NAME);
  }

  const home = os.homedir();
  const macSupport = path.join(home, 'Library', 'Application Support');
  if (platform === 'darwin' && fs.existsSync(macSupport)) {
    return path.join(macSupport, APP_NAME);
  }

  if (process.env.XDG_CONFIG_HOME) {
    return path.join(process.env.XDG_CONFIG_HOME, APP_NAME);
  }

  return path.join(home, '.config', APP_NAME);
}

/**
 * Like getAppDataDir, but creates the directory. Falls back to the working
 * directory when it cannot be created.
 */
export function ensureAppDataDir(): string {
  const dir = getAppDataDir();
  try {
    fs.mkdirSync(dir, { recursive: true });
    return dir;
  } catch {
    return process.cwd();
  }
}

/** Expand a leading ~ to the user's home directory */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}
