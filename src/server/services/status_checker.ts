import type { StatusConfig } from '../../config/types/viewer.js';
import { ChannelStatus, type ChannelReference } from '../../types/stream.js';
import { BoundedCache } from '../utils/bounded_cache.js';
import { mapWithConcurrency } from '../utils/async_helpers.js';
import { canonicalUrlFor } from '../utils/url_validator.js';
import type { HttpClient } from './http_client.js';
import { logger } from './logger.js';

const LIVE_MARKERS: readonly RegExp[] = [
  /"isLiveBroadcast"\s*:\s*true/i,
  /"broadcastType"\s*:\s*"live"/i,
  /"isLive"\s*:\s*true/i,
  /"viewerCount"\s*:\s*[1-9]\d*/i
];

const OFFLINE_MARKERS: readonly RegExp[] = [
  /"isLiveBroadcast"\s*:\s*false/i,
  /"broadcastType"\s*:\s*"upload"/i,
  /OfflineScreen/i
];

export type StatusEachCallback = (channel: ChannelReference, status: ChannelStatus) => void;

/**
 * Classify a channel page by its embedded metadata, or null when the page
 * carries neither live nor offline markers.
 */
export function classifyPage(body: string): ChannelStatus.ONLINE | ChannelStatus.OFFLINE | null {
  if (LIVE_MARKERS.some((marker) => marker.test(body))) {
    return ChannelStatus.ONLINE;
  }
  if (OFFLINE_MARKERS.some((marker) => marker.test(body))) {
    return ChannelStatus.OFFLINE;
  }
  return null;
}

export class StatusChecker {
  private readonly cache: BoundedCache<string, ChannelStatus>;

  constructor(
    private readonly http: HttpClient,
    private readonly config: StatusConfig,
    now: () => number = Date.now
  ) {
    this.cache = new BoundedCache<string, ChannelStatus>({ maxSize: config.cacheSize, ttlMs: config.cacheDurationMs, now });
  }

  private get headers(): Record<string, string> {
    return {
      'User-Agent': this.config.userAgent,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
      Connection: 'keep-alive'
    };
  }

  /** Never rejects; network trouble maps to unknown */
  async checkStatus(channel: ChannelReference): Promise<ChannelStatus> {
    const key = channel.handle.toLowerCase();
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      logger.debug(`Cache hit for ${key}: ${cached}`, 'StatusChecker');
      return cached;
    }

    const status = await this.fetchStatus(key);
    this.cache.set(key, status);
    return status;
  }

  private async fetchStatus(handle: string): Promise<ChannelStatus> {
    const url = canonicalUrlFor(handle);
    try {
      const response = await this.http.getText(url, {
        headers: this.headers,
        timeoutMs: this.config.requestTimeoutMs,
        maxChars: this.config.bodyScanLimit
      });

      if (response.status !== 200) {
        logger.warn(`Status check for ${handle} returned HTTP ${response.status}`, 'StatusChecker');
        return ChannelStatus.UNKNOWN;
      }

      const status = classifyPage(response.body);
      if (status === null) {
        logger.debug(`No status markers for ${handle}, assuming offline`, 'StatusChecker');
        return ChannelStatus.OFFLINE;
      }
      logger.debug(`${handle} is ${status}`, 'StatusChecker');
      return status;
    } catch (error) {
      logger.warn(`Status check for ${handle} failed`, 'StatusChecker', error);
      return ChannelStatus.UNKNOWN;
    }
  }

  /**
   * Check several channels with bounded concurrency. Duplicate handles are
   * checked once; the map is keyed by canonical URL.
   */
  async checkMultiple(
    channels: readonly ChannelReference[],
    onEach?: StatusEachCallback
  ): Promise<Map<string, ChannelStatus>> {
    const distinct = new Map<string, ChannelReference>();
    for (const channel of channels) {
      const key = channel.handle.toLowerCase();
      if (!distinct.has(key)) distinct.set(key, channel);
    }

    const targets = [...distinct.values()];
    const statuses = await mapWithConcurrency(
      targets,
      this.config.concurrency,
      async (channel) => {
        const status = await this.checkStatus(channel);
        if (onEach) {
          try {
            onEach(channel, status);
          } catch (error) {
            logger.error(`Status callback failed for ${channel.handle}`, 'StatusChecker', error);
          }
        }
        return status;
      },
      'StatusChecker:checkMultiple',
      () => ChannelStatus.UNKNOWN
    );

    const results = new Map<string, ChannelStatus>();
    targets.forEach((channel, index) => {
      results.set(canonicalUrlFor(channel.handle), statuses[index]);
    });
    return results;
  }

  clearCache(): void {
    this.cache.clear();
    logger.debug('Status cache cleared', 'StatusChecker');
  }
}
