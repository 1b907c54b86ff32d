#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { APP_VERSION } from '../config/paths.js';
import { DEFAULT_QUALITY, QUALITY_OPTIONS, isQuality, type Quality } from '../types/stream.js';
import { logger, LogLevel } from '../server/services/logger.js';
import { createStreamViewer, type StreamViewer } from '../server/stream_viewer.js';
import { toChannelReference, validate } from '../server/utils/url_validator.js';
import { createStopHandler } from './session.js';
import { formatSlot, formatUptime, getTimestamp, parseSlot, statusBadge } from './format.js';

function parseQuality(value: string): Quality {
  if (!isQuality(value)) {
    console.error(chalk.red(`Unknown quality "${value}". Choose one of: ${QUALITY_OPTIONS.join(', ')}`));
    process.exit(1);
  }
  return value;
}

/**
 * Attach printers, run `begin`, and resolve when the session stops or never
 * starts. Ctrl-C stops the stream.
 */
async function runSession(viewer: StreamViewer, begin: () => Promise<boolean>): Promise<boolean> {
  let startedAt = 0;
  let failed = false;

  viewer.on('started', (channel, quality) => {
    startedAt = Date.now();
    console.log(getTimestamp(), chalk.green(`▶ Watching ${channel.displayName} (${quality})`));
    console.log(chalk.dim('Press Ctrl-C to stop'));
  });
  viewer.on('stateChanged', (state) => logger.debug(`State: ${state}`, 'CLI'));
  viewer.on('error', (message) => {
    failed = true;
    console.error(getTimestamp(), chalk.red(message));
  });

  const stopped = new Promise<void>((resolve) => viewer.once('stopped', () => resolve()));

  const onSignal = createStopHandler(viewer);
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    if (!(await begin())) {
      return false;
    }
    await stopped;
    if (startedAt > 0) {
      console.log(getTimestamp(), chalk.blue(`■ Stream stopped after ${formatUptime(startedAt)}`));
    }
    return !failed;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await viewer.shutdown();
  }
}

program
  .name('streamwatch')
  .version(APP_VERSION)
  .description('Watch Twitch streams through streamlink and keep quick-swap favorites')
  .option('-d, --debug', 'Enable debug output')
  .hook('preAction', () => {
    if (program.opts().debug) {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('Debug mode enabled', 'CLI');
    }
  });

program
  .command('watch')
  .description('Play a channel (defaults to the last one watched)')
  .argument('[url]', 'Twitch channel URL')
  .option('-q, --quality <quality>', `Stream quality (${QUALITY_OPTIONS.join(', ')})`)
  .action(async (url: string | undefined, options: { quality?: string }) => {
    const viewer = createStreamViewer();
    const last = viewer.lastSession();
    const target = url ?? last?.url;
    if (!target) {
      console.error(chalk.red('No URL given and no previous stream to resume.'));
      await viewer.shutdown();
      process.exitCode = 1;
      return;
    }
    const quality = options.quality ? parseQuality(options.quality) : last?.quality ?? DEFAULT_QUALITY;
    const ok = await runSession(viewer, () => viewer.start(target, quality));
    if (!ok) process.exitCode = 1;
  });

program
  .command('play')
  .description('Play a favorite slot')
  .argument('<slot>', 'Slot number, starting at 1')
  .option('-q, --quality <quality>', 'Stream quality')
  .action(async (slot: string, options: { quality?: string }) => {
    const viewer = createStreamViewer();
    const index = parseSlot(slot);
    if (index === null || !viewer.favorites.isValidIndex(index)) {
      console.error(chalk.red(`No favorite in slot ${slot}`));
      await viewer.shutdown();
      process.exitCode = 1;
      return;
    }
    const quality = options.quality ? parseQuality(options.quality) : undefined;
    const ok = await runSession(viewer, () => viewer.loadFavorite(index, quality));
    if (!ok) process.exitCode = 1;
  });

const favoriteCommands = program.command('favorites').description('Manage quick-swap favorites');

favoriteCommands
  .command('list')
  .description('Show favorite slots')
  .action(async () => {
    const viewer = createStreamViewer();
    const slots = viewer.listFavorites();
    if (slots.length === 0) {
      console.log(chalk.yellow('No favorites yet. Add one with: streamwatch favorites add <url>'));
    } else {
      console.log(chalk.blue(`\nFavorites (${slots.length}/${viewer.favorites.capacity}):`));
      slots.forEach((slot, index) => console.log(formatSlot(slot, index)));
    }
    await viewer.shutdown();
  });

favoriteCommands
  .command('add')
  .description('Add a channel to the next free slot')
  .argument('<url>', 'Twitch channel URL')
  .action(async (url: string) => {
    const viewer = createStreamViewer();
    const result = validate(url);
    if (!result.valid) {
      console.error(chalk.red(result.reason));
      process.exitCode = 1;
    } else if (viewer.favorites.has(url)) {
      console.log(chalk.yellow(`${toChannelReference(url)?.displayName ?? url} is already a favorite`));
    } else if (viewer.favorites.isFull()) {
      console.error(
        chalk.red(`All ${viewer.favorites.capacity} quick swap slots are occupied. Remove a stream to add a new one.`)
      );
      process.exitCode = 1;
    } else if (viewer.addFavorite(url)) {
      console.log(chalk.green(`Added ${toChannelReference(url)?.displayName ?? url}`));
    }
    await viewer.shutdown();
  });

favoriteCommands
  .command('remove')
  .description('Remove a favorite slot')
  .argument('<slot>', 'Slot number, starting at 1')
  .action(async (slot: string) => {
    const viewer = createStreamViewer();
    const index = parseSlot(slot);
    const channel = index === null ? null : viewer.favorites.get(index);
    if (index === null || !channel || !viewer.removeFavorite(index)) {
      console.error(chalk.red(`No favorite in slot ${slot}`));
      process.exitCode = 1;
    } else {
      console.log(chalk.green(`Removed ${channel.displayName}`));
    }
    await viewer.shutdown();
  });

favoriteCommands
  .command('check')
  .description('Check which favorites are live')
  .action(async () => {
    const viewer = createStreamViewer();
    if (viewer.favorites.size === 0) {
      console.log(chalk.yellow('No streams in quick swap to check.'));
      await viewer.shutdown();
      return;
    }
    viewer.on('statusUpdate', (channel, status, index) => {
      logger.debug(`Slot ${index + 1} ${channel.handle}: ${status}`, 'CLI');
    });
    try {
      await viewer.checkAllStatuses();
      viewer.listFavorites().forEach((slot, index) => console.log(formatSlot(slot, index)));
    } finally {
      await viewer.shutdown();
    }
  });

program
  .command('status')
  .description('Check whether a channel is live')
  .argument('<url>', 'Twitch channel URL')
  .action(async (url: string) => {
    const channel = toChannelReference(url);
    if (!channel) {
      console.error(chalk.red(validate(url).reason || 'Invalid Twitch URL'));
      process.exitCode = 1;
      return;
    }
    const viewer = createStreamViewer();
    try {
      const status = await viewer.checker.checkStatus(channel);
      console.log(`${chalk.cyan(channel.displayName)} ${statusBadge(status)}`);
    } finally {
      await viewer.shutdown();
    }
  });

program
  .command('locate')
  .description('Show which streamlink executable will be used')
  .action(async () => {
    const viewer = createStreamViewer();
    try {
      if (await viewer.streamlink.discover()) {
        console.log(chalk.green(viewer.streamlink.getPath() ?? 'streamlink'));
      } else {
        console.error(chalk.red('Streamlink not found. Please install Streamlink.'));
        process.exitCode = 1;
      }
    } finally {
      await viewer.shutdown();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed', 'CLI', error);
  process.exit(1);
});
