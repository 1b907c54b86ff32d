import path from 'path';
import * as fs from 'fs';
import { ViewerConfigSchema } from './schemas/viewer.js';
import { defaultViewerConfig } from './defaults/viewer.js';
import type { ViewerConfig } from './types/viewer.js';
import { getAppDataDir } from './paths.js';
import { env } from './env.js';
import { logger } from '../server/services/logger.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeSection(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeSection(base[key], value);
  }
  return merged;
}

function readUserConfig(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    logger.debug(`No config file at ${filePath}, using defaults`, 'ConfigLoader');
    return {};
  }
  logger.info(`Loading config file: ${filePath}`, 'ConfigLoader');
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function applyEnvOverrides(config: ViewerConfig): ViewerConfig {
  return {
    ...config,
    streamlink: {
      ...config.streamlink,
      path: env.STREAMLINK_PATH ?? config.streamlink.path,
      proxyUrl: env.STREAMWATCH_PROXY_URL ?? config.streamlink.proxyUrl
    }
  };
}

/**
 * Defaults, overlaid with <appData>/config.json, overlaid with environment.
 * A broken config file is reported and ignored.
 */
export function loadViewerConfig(configDir: string = getAppDataDir()): ViewerConfig {
  const filePath = path.join(configDir, 'config.json');
  const defaults = ViewerConfigSchema.parse(defaultViewerConfig);

  try {
    const merged = mergeSection(defaultViewerConfig, readUserConfig(filePath));
    const parsed = ViewerConfigSchema.safeParse(merged);
    if (!parsed.success) {
      logger.warn(
        `Invalid config file ${filePath}, using defaults: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        'ConfigLoader'
      );
      return applyEnvOverrides(defaults);
    }
    logger.debug(JSON.stringify(parsed.data), 'ConfigLoader');
    return applyEnvOverrides(parsed.data);
  } catch (error) {
    logger.warn('Failed to load config file, using default config', 'ConfigLoader');
    logger.debug(error instanceof Error ? error.message : String(error), 'ConfigLoader');
    return applyEnvOverrides(defaults);
  }
}

