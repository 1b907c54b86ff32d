import chalk from 'chalk';
import { format } from 'date-fns';
import { ChannelStatus, type FavoriteSlot } from '../types/stream.js';

export function getTimestamp(date: Date = new Date()): string {
  return format(date, 'HH:mm:ss');
}

export function formatUptime(startTime: number, now: number = Date.now()): string {
  const diff = Math.max(0, Math.floor((now - startTime) / 1000));

  const hours = Math.floor(diff / 3600);
  const minutes = Math.floor((diff % 3600) / 60);
  const seconds = diff % 60;

  const parts: string[] = [];
  if (hours > 0) {
    parts.push(`${hours} hour${hours !== 1 ? 's' : ''}`);
  }
  if (minutes > 0 || hours > 0) {
    parts.push(`${minutes} minute${minutes !== 1 ? 's' : ''}`);
  }
  parts.push(`${seconds} second${seconds !== 1 ? 's' : ''}`);

  if (parts.length > 1) {
    const lastPart = parts.pop();
    return `${parts.join(', ')} and ${lastPart}`;
  }
  return parts[0];
}

const STATUS_ICONS: Record<ChannelStatus, string> = {
  [ChannelStatus.ONLINE]: '●',
  [ChannelStatus.OFFLINE]: '○',
  [ChannelStatus.CHECKING]: '…',
  [ChannelStatus.UNKNOWN]: '?'
};

export function statusBadge(status: ChannelStatus): string {
  const label = `${STATUS_ICONS[status]} ${status}`;
  switch (status) {
    case ChannelStatus.ONLINE:
      return chalk.green(label);
    case ChannelStatus.OFFLINE:
      return chalk.gray(label);
    case ChannelStatus.CHECKING:
      return chalk.yellow(label);
    default:
      return chalk.dim(label);
  }
}

/** One line per slot, numbered from 1 */
export function formatSlot(slot: FavoriteSlot, index: number): string {
  const checked = slot.lastCheckedAt ? chalk.dim(` (checked ${getTimestamp(slot.lastCheckedAt)})`) : '';
  return `${index + 1}. ${chalk.cyan(slot.channel.displayName.padEnd(25))} ${statusBadge(slot.status)}${checked}`;
}

/** Parse a 1-based slot argument into a 0-based index, or null */
export function parseSlot(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) return null;
  const slot = Number.parseInt(value, 10);
  return slot >= 1 ? slot - 1 : null;
}
