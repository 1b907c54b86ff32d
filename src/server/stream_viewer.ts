import { EventEmitter } from 'events';
import path from 'path';
import { loadViewerConfig } from '../config/loader.js';
import { ensureAppDataDir } from '../config/paths.js';
import type { ViewerConfig } from '../config/types/viewer.js';
import {
  DEFAULT_QUALITY,
  type ChannelReference,
  type ChannelStatus,
  type FavoriteSlot,
  type Quality,
  type SessionInfo,
  type StreamState
} from '../types/stream.js';
import { StreamErrorKind, type ViewerEvents } from './types/events.js';
import { FavoritesRegistry } from './services/favorites.js';
import { FetchHttpClient, type HttpClient } from './services/http_client.js';
import { logger } from './services/logger.js';
import { SETTINGS_FILE_NAME, SettingsStore } from './services/settings_store.js';
import { StatusChecker } from './services/status_checker.js';
import { StreamlinkService } from './services/streamlink.js';
import { StreamSupervisor } from './services/stream_supervisor.js';
import { hiddenProcessRunner, type ProcessRunner } from './utils/process_utils.js';
import { toChannelReference, validate } from './utils/url_validator.js';

export interface StreamViewerDeps {
  supervisor: StreamSupervisor;
  favorites: FavoritesRegistry;
  settings: SettingsStore;
  checker: StatusChecker;
  streamlink: StreamlinkService;
  /** Closed on shutdown when present */
  http?: HttpClient;
}

export interface LastSession {
  url: string;
  quality: Quality;
}

type StreamAction = (channel: ChannelReference, quality: Quality) => Promise<boolean>;

/**
 * Entry point for a front end: validates input, remembers the last stream,
 * and forwards supervisor and favorites events.
 */
export class StreamViewer extends EventEmitter<ViewerEvents> {
  readonly supervisor: StreamSupervisor;
  readonly favorites: FavoritesRegistry;
  readonly settings: SettingsStore;
  readonly checker: StatusChecker;
  readonly streamlink: StreamlinkService;
  private readonly http?: HttpClient;

  constructor(deps: StreamViewerDeps) {
    super();
    this.supervisor = deps.supervisor;
    this.favorites = deps.favorites;
    this.settings = deps.settings;
    this.checker = deps.checker;
    this.streamlink = deps.streamlink;
    this.http = deps.http;

    this.supervisor.on('started', (channel, quality) => this.emit('started', channel, quality));
    this.supervisor.on('stopped', () => this.emit('stopped'));
    this.supervisor.on('stateChanged', (state) => this.emit('stateChanged', state));
    this.supervisor.on('error', (message, kind) => this.reportError(message, kind));
  }

  private reportError(message: string, kind: StreamErrorKind): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', message, kind);
    } else {
      logger.error(`Unhandled viewer error (${kind}): ${message}`, 'StreamViewer');
    }
  }

  getState(): StreamState {
    return this.supervisor.getState();
  }

  getSession(): SessionInfo | null {
    return this.supervisor.getSession();
  }

  private async runValidated(url: string, quality: Quality, action: StreamAction): Promise<boolean> {
    const result = validate(url);
    const channel = result.valid ? toChannelReference(url) : null;
    if (!result.valid || !channel) {
      this.reportError(result.reason, StreamErrorKind.INVALID_URL);
      return false;
    }

    this.settings.set('last_url', url.trim());
    this.settings.set('last_quality', quality);
    this.settings.set('last_streamer_name', channel.displayName);
    return action(channel, quality);
  }

  start(url: string, quality: Quality = DEFAULT_QUALITY): Promise<boolean> {
    return this.runValidated(url, quality, (channel, q) => this.supervisor.start(channel, q));
  }

  switch(url: string, quality: Quality = DEFAULT_QUALITY): Promise<boolean> {
    return this.runValidated(url, quality, (channel, q) => this.supervisor.switch(channel, q));
  }

  stop(): Promise<void> {
    return this.supervisor.stop();
  }

  addFavorite(url: string): boolean {
    return this.favorites.add(url);
  }

  removeFavorite(index: number): boolean {
    return this.favorites.removeByIndex(index);
  }

  listFavorites(): FavoriteSlot[] {
    return this.favorites.list();
  }

  /**
   * Play the favorite at index, switching if a stream is already running.
   * Falls back to the last used quality.
   */
  async loadFavorite(index: number, quality?: Quality): Promise<boolean> {
    const channel = this.favorites.get(index);
    if (!channel) {
      logger.warn(`No favorite in slot ${index + 1}`, 'StreamViewer');
      return false;
    }

    this.settings.set('last_url', channel.canonicalUrl);
    const chosen = quality ?? this.settings.get('last_quality');
    return this.supervisor.isRunning()
      ? this.supervisor.switch(channel, chosen)
      : this.supervisor.start(channel, chosen);
  }

  checkAllStatuses(): Promise<Map<string, ChannelStatus>> {
    return this.favorites.checkAll((channel, status, index) => {
      this.emit('statusUpdate', channel, status, index);
    });
  }

  /** Saved URL and quality, or null when nothing usable was saved */
  lastSession(): LastSession | null {
    const url = this.settings.get('last_url');
    if (!url || !validate(url).valid) return null;
    return { url, quality: this.settings.get('last_quality') };
  }

  async shutdown(): Promise<void> {
    try {
      await this.supervisor.shutdown();
    } finally {
      this.settings.save();
      this.http?.close();
      logger.debug('Viewer shut down', 'StreamViewer');
    }
  }
}

export interface CreateStreamViewerOptions {
  config?: ViewerConfig;
  dataDir?: string;
  runner?: ProcessRunner;
  http?: HttpClient;
}

export function createStreamViewer(options: CreateStreamViewerOptions = {}): StreamViewer {
  const dataDir = options.dataDir ?? ensureAppDataDir();
  const config = options.config ?? loadViewerConfig(dataDir);
  const runner = options.runner ?? hiddenProcessRunner;
  const http = options.http ?? new FetchHttpClient();

  const settings = new SettingsStore(path.join(dataDir, SETTINGS_FILE_NAME));
  const streamlink = new StreamlinkService(config.streamlink, runner);
  const supervisor = new StreamSupervisor(streamlink, config.supervisor, runner);
  const checker = new StatusChecker(http, config.status);
  const favorites = new FavoritesRegistry(settings, checker);

  return new StreamViewer({ supervisor, favorites, settings, checker, streamlink, http });
}
