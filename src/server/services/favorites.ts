import {
  ChannelStatus,
  type ChannelReference,
  type FavoriteSlot,
  type StatusUpdateCallback
} from '../../types/stream.js';
import { sameChannel, toChannelReference, validate } from '../utils/url_validator.js';
import type { SettingsStore } from './settings_store.js';
import type { StatusChecker } from './status_checker.js';
import { logger } from './logger.js';

export const MAX_FAVORITES = 4;

/**
 * Ordered quick-swap slots. Every mutation is persisted before it returns,
 * or undone when the save fails.
 */
export class FavoritesRegistry {
  readonly capacity = MAX_FAVORITES;
  private slots: FavoriteSlot[];

  constructor(
    private readonly settings: SettingsStore,
    private readonly checker: StatusChecker
  ) {
    this.slots = this.loadSlots(settings.get('quick_swap_streams'));
  }

  private loadSlots(urls: readonly string[]): FavoriteSlot[] {
    const slots: FavoriteSlot[] = [];
    const seen = new Set<string>();
    for (const url of urls) {
      if (slots.length >= this.capacity) break;
      if (!validate(url).valid) {
        logger.debug(`Dropping invalid saved favorite ${url}`, 'Favorites');
        continue;
      }
      const channel = toChannelReference(url);
      if (!channel || seen.has(channel.handle)) continue;
      seen.add(channel.handle);
      slots.push({ channel, status: ChannelStatus.UNKNOWN, lastCheckedAt: null });
    }
    return slots;
  }

  private persist(): boolean {
    return this.settings.set(
      'quick_swap_streams',
      this.slots.map((slot) => slot.channel.canonicalUrl)
    );
  }

  /** Put the settings document back in step with the slots after a failed save */
  private restoreSaved(): void {
    if (!this.persist()) {
      logger.warn('Favorites change was not saved and has been undone', 'Favorites');
    }
  }

  private indexOfChannel(channel: ChannelReference): number {
    return this.slots.findIndex((slot) => sameChannel(slot.channel, channel));
  }

  private indexOfUrl(url: string): number {
    const channel = toChannelReference(url);
    return channel ? this.indexOfChannel(channel) : -1;
  }

  add(url: string): boolean {
    if (!url || this.isFull()) return false;
    if (!validate(url).valid) return false;

    const channel = toChannelReference(url);
    if (!channel || this.indexOfChannel(channel) !== -1) return false;

    this.slots.push({ channel, status: ChannelStatus.UNKNOWN, lastCheckedAt: null });
    if (!this.persist()) {
      this.slots.pop();
      this.restoreSaved();
      return false;
    }
    logger.info(`Added favorite ${channel.displayName}`, 'Favorites');
    return true;
  }

  removeByIndex(index: number): boolean {
    if (!this.isValidIndex(index)) return false;
    const [removed] = this.slots.splice(index, 1);
    if (!this.persist()) {
      this.slots.splice(index, 0, removed);
      this.restoreSaved();
      return false;
    }
    logger.info(`Removed favorite ${removed.channel.displayName}`, 'Favorites');
    return true;
  }

  remove(url: string): boolean {
    const index = this.indexOfUrl(url);
    return index === -1 ? false : this.removeByIndex(index);
  }

  get(index: number): ChannelReference | null {
    return this.isValidIndex(index) ? this.slots[index].channel : null;
  }

  list(): FavoriteSlot[] {
    return this.slots.map((slot) => ({ ...slot }));
  }

  has(url: string): boolean {
    return this.indexOfUrl(url) !== -1;
  }

  getStatus(url: string): ChannelStatus {
    const index = this.indexOfUrl(url);
    return index === -1 ? ChannelStatus.UNKNOWN : this.slots[index].status;
  }

  isFull(): boolean {
    return this.slots.length >= this.capacity;
  }

  availableSlots(): number {
    return this.capacity - this.slots.length;
  }

  isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.slots.length;
  }

  get size(): number {
    return this.slots.length;
  }

  private notify(onUpdate: StatusUpdateCallback | undefined, slot: FavoriteSlot, index: number): void {
    if (!onUpdate) return;
    try {
      onUpdate(slot.channel, slot.status, index);
    } catch (error) {
      logger.error(`Status update handler failed for ${slot.channel.handle}`, 'Favorites', error);
    }
  }

  /**
   * Mark every slot as checking (synchronously, before returning), then
   * resolve each through the status checker. A slot removed while its check
   * is in flight gets no final update.
   */
  checkAll(onUpdate?: StatusUpdateCallback): Promise<Map<string, ChannelStatus>> {
    const snapshot = [...this.slots];
    snapshot.forEach((slot, index) => {
      slot.status = ChannelStatus.CHECKING;
      this.notify(onUpdate, slot, index);
    });

    if (snapshot.length === 0) {
      return Promise.resolve(new Map());
    }

    return this.checker.checkMultiple(
      snapshot.map((slot) => slot.channel),
      (channel, status) => {
        const index = this.indexOfChannel(channel);
        if (index === -1) {
          logger.debug(`Skipping status of removed favorite ${channel.handle}`, 'Favorites');
          return;
        }
        const slot = this.slots[index];
        slot.status = status;
        slot.lastCheckedAt = new Date();
        this.notify(onUpdate, slot, index);
      }
    );
  }
}
