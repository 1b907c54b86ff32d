import chalk from 'chalk';
import { StreamState } from '../types/stream.js';
import { logger } from '../server/services/logger.js';
import type { StreamViewer } from '../server/stream_viewer.js';

/**
 * Ctrl-C handler for a watch session. A stop asked for before the stream is
 * running is held until it starts; a second Ctrl-C while waiting quits.
 */
export function createStopHandler(viewer: StreamViewer, exit: (code: number) => void = (code) => process.exit(code)): () => void {
  let requested = false;

  const stop = () => {
    viewer.stop().catch((error: unknown) => logger.error('Failed to stop stream', 'CLI', error));
  };

  viewer.on('started', () => {
    if (requested) {
      requested = false;
      stop();
    }
  });

  return () => {
    if (viewer.getState() === StreamState.RUNNING) {
      console.log(chalk.yellow('\nStopping stream...'));
      stop();
      return;
    }
    if (requested) {
      exit(130);
      return;
    }
    requested = true;
    console.log(chalk.yellow(`\nStream is ${viewer.getState()}, stopping once it starts (Ctrl-C again to quit)`));
  };
}
