import { z } from 'zod';
import { QUALITY_OPTIONS } from '../../types/stream.js';
import { APP_VERSION } from '../paths.js';

const platformPaths = z.object({
  win32: z.array(z.string()).default([]),
  darwin: z.array(z.string()).default([]),
  linux: z.array(z.string()).default([])
});

export const StreamlinkConfigSchema = z.object({
  /** Probed first when set */
  path: z.string().optional(),
  /** Names resolved through PATH */
  pathLookup: z.array(z.string()).default(['streamlink']),
  installPaths: platformPaths.default({}),
  /** May start with ~ */
  userPaths: platformPaths.default({}),
  probeTimeoutMs: z.number().int().positive().default(5000),
  proxyUrl: z.string().url().default('https://eu.luminous.dev')
});

export const SupervisorConfigSchema = z.object({
  stopTimeoutMs: z.number().int().nonnegative().default(3000),
  killTimeoutMs: z.number().int().nonnegative().default(2000),
  switchDelayMs: z.number().int().nonnegative().default(500),
  /** Image names closed with taskkill on Windows after a stop */
  mediaPlayers: z.array(z.string()).default(['vlc.exe', 'wmplayer.exe', 'mpv.exe']),
  outputLimitBytes: z.number().int().positive().default(64 * 1024)
});

export const StatusConfigSchema = z.object({
  cacheDurationMs: z.number().int().nonnegative().default(60_000),
  cacheSize: z.number().int().positive().default(50),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  /** 0 scans the whole page */
  bodyScanLimit: z.number().int().nonnegative().default(0),
  concurrency: z.number().int().min(1).max(5).default(5),
  userAgent: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    )
});

export const ViewerConfigSchema = z.object({
  streamlink: StreamlinkConfigSchema.default({}),
  supervisor: SupervisorConfigSchema.default({}),
  status: StatusConfigSchema.default({})
});

/**
 * settings.json. Each field falls back to its default on its own so that one
 * bad value does not discard the rest of the document.
 */
export const SettingsSchema = z.object({
  last_url: z.string().catch(''),
  last_quality: z.enum(QUALITY_OPTIONS).catch('best'),
  last_streamer_name: z.string().catch(''),
  quick_swap_streams: z
    .array(z.unknown())
    .transform((items) => items.filter((item): item is string => typeof item === 'string'))
    .catch([]),
  app_version: z.string().catch(APP_VERSION)
});
