/** Quality tokens accepted by streamlink, best first */
export const QUALITY_OPTIONS = [
  'best',
  '1080p60',
  '1080p',
  '720p60',
  '720p',
  '480p',
  '360p',
  'worst'
] as const;

export type Quality = (typeof QUALITY_OPTIONS)[number];

export const DEFAULT_QUALITY: Quality = 'best';

export function isQuality(value: unknown): value is Quality {
  return typeof value === 'string' && QUALITY_OPTIONS.some((option) => option === value);
}

/**
 * Canonical identity of a Twitch channel
 */
export interface ChannelReference {
  /** Lowercased handle, 3-25 word characters */
  handle: string;
  /** Capitalized handle for display */
  displayName: string;
  /** https://www.twitch.tv/<handle> */
  canonicalUrl: string;
}

/** Lifecycle of the supervised streamlink process */
export enum StreamState {
  STOPPED = 'stopped',
  STARTING = 'starting',
  RUNNING = 'running',
  STOPPING = 'stopping',
  ERROR = 'error'
}

/** Live status of a favorite channel */
export enum ChannelStatus {
  UNKNOWN = 'unknown',
  CHECKING = 'checking',
  ONLINE = 'online',
  OFFLINE = 'offline'
}

/** Read-only view of the active session; never carries the process handle */
export interface SessionInfo {
  channel: ChannelReference;
  quality: Quality;
  state: StreamState;
  startedAt: number;
}

export interface FavoriteSlot {
  channel: ChannelReference;
  status: ChannelStatus;
  lastCheckedAt: Date | null;
}

/** Fired with the slot's current index */
export type StatusUpdateCallback = (channel: ChannelReference, status: ChannelStatus, index: number) => void;
