import { EventEmitter } from 'events';
import type { SupervisorConfig } from '../../config/types/viewer.js';
import { StreamState, type ChannelReference, type Quality, type SessionInfo } from '../../types/stream.js';
import { StreamErrorKind, type SupervisorEvents } from '../types/events.js';
import { delay, settlesWithin } from '../utils/async_helpers.js';
import {
  hiddenProcessRunner,
  listChildPids,
  type LaunchedProcess,
  type ProcessRunner
} from '../utils/process_utils.js';
import type { StreamlinkService } from './streamlink.js';
import { logger } from './logger.js';

export const TOOL_UNAVAILABLE_MESSAGE = 'Streamlink not found. Please install Streamlink.';
export const UNKNOWN_ERROR_MESSAGE = 'Unknown error occurred';

/** Known streamlink failure fragments, checked in order */
export const FRIENDLY_ERRORS: ReadonlyArray<readonly [pattern: string, message: string]> = [
  ['No playable streams found', 'Stream not found or offline'],
  ['Unable to open URL', 'Unable to connect to stream'],
  ['Authentication failed', 'Stream requires authentication'],
  ['Network is unreachable', 'Network connection error'],
  ['Connection timed out', 'Connection timeout - try again'],
  ['404 Client Error', 'Stream not found or offline'],
  ['403 Client Error', 'Stream is subscriber-only or restricted'],
  ['500 Server Error', 'Twitch server error - try again later']
];

/**
 * Turn captured streamlink output into a short message for the user.
 */
export function parseErrorMessage(stderr: string, stdout = ''): string {
  const err = stderr.trim();
  const out = stdout.trim();
  const combined = out ? `${err}\n${out}` : err;

  for (const [pattern, message] of FRIENDLY_ERRORS) {
    if (combined.includes(pattern)) return message;
  }
  return combined.trim() || UNKNOWN_ERROR_MESSAGE;
}

interface StreamSession {
  id: number;
  channel: ChannelReference;
  quality: Quality;
  argv: string[];
  startedAt: number;
  process: LaunchedProcess | null;
  stoppedByUser: boolean;
  finished: boolean;
  monitor: Promise<void>;
}

/**
 * Owns the single streamlink child process: starts it, watches it, and
 * tears it down. Only one session exists outside the stopped state.
 */
export class StreamSupervisor extends EventEmitter<SupervisorEvents> {
  private state: StreamState = StreamState.STOPPED;
  private session: StreamSession | null = null;
  private pendingStart = false;
  private sessionCounter = 0;

  constructor(
    private readonly streamlink: StreamlinkService,
    private readonly config: SupervisorConfig,
    private readonly runner: ProcessRunner = hiddenProcessRunner,
    private readonly platform: NodeJS.Platform = process.platform
  ) {
    super();
  }

  getState(): StreamState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === StreamState.RUNNING;
  }

  getSession(): SessionInfo | null {
    if (!this.session) return null;
    return {
      channel: this.session.channel,
      quality: this.session.quality,
      state: this.state,
      startedAt: this.session.startedAt
    };
  }

  /** Resolves once the current session (if any) has been cleaned up */
  async waitForIdle(): Promise<void> {
    while (this.session) {
      const { monitor } = this.session;
      await monitor;
      if (this.session && this.session.monitor === monitor) {
        // stop() is still tearing down
        await new Promise<void>((resolve) => this.once('stopped', () => resolve()));
      }
    }
  }

  /** Listener errors are logged and never reach the lifecycle code. */
  private notify(event: keyof SupervisorEvents, fire: () => boolean): void {
    try {
      fire();
    } catch (error) {
      logger.error(`Listener for '${event}' failed`, 'StreamSupervisor', error);
    }
  }

  /** 'error' without a listener would throw from EventEmitter */
  private reportError(message: string, kind: StreamErrorKind): void {
    if (this.listenerCount('error') > 0) {
      this.notify('error', () => this.emit('error', message, kind));
    }
  }

  private setState(state: StreamState): void {
    if (this.state === state) return;
    logger.debug(`State ${this.state} -> ${state}`, 'StreamSupervisor');
    this.state = state;
    this.notify('stateChanged', () => this.emit('stateChanged', state));
  }

  /**
   * Launch streamlink for the channel. Resolves true once the launch has been
   * handed to the background monitor, without waiting for the spawn.
   */
  async start(channel: ChannelReference, quality: Quality): Promise<boolean> {
    if (this.state !== StreamState.STOPPED || this.pendingStart) {
      logger.warn(`Ignoring start of ${channel.handle}: stream is ${this.state}`, 'StreamSupervisor');
      return false;
    }
    this.pendingStart = true;

    try {
      if (!(await this.streamlink.isAvailable())) {
        logger.error(TOOL_UNAVAILABLE_MESSAGE, 'StreamSupervisor');
        this.reportError(TOOL_UNAVAILABLE_MESSAGE, StreamErrorKind.TOOL_UNAVAILABLE);
        return false;
      }

      const argv = this.streamlink.buildCommand(channel, quality);
      const session: StreamSession = {
        id: ++this.sessionCounter,
        channel,
        quality,
        argv,
        startedAt: Date.now(),
        process: null,
        stoppedByUser: false,
        finished: false,
        monitor: Promise.resolve()
      };
      this.session = session;
      this.setState(StreamState.STARTING);
      logger.info(`Starting stream: ${argv.join(' ')}`, 'StreamSupervisor');

      session.monitor = this.monitor(session);
      return true;
    } finally {
      this.pendingStart = false;
    }
  }

  private async monitor(session: StreamSession): Promise<void> {
    try {
      const [file, ...args] = session.argv;
      let child: LaunchedProcess;
      try {
        child = this.runner.launch(file, args, { outputLimitBytes: this.config.outputLimitBytes });
        session.process = child;
        await child.spawned;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(`Failed to start streamlink for ${session.channel.handle}`, 'StreamSupervisor', error);
        if (!session.stoppedByUser) {
          this.setState(StreamState.ERROR);
          this.reportError(`Failed to start stream: ${reason}`, StreamErrorKind.SPAWN_FAILURE);
        }
        return;
      }

      this.setState(StreamState.RUNNING);
      const info = this.streamlink.extractStreamInfo(session.argv);
      logger.info(
        `Stream started (pid ${child.pid ?? 'unknown'}): ${info?.url ?? session.channel.canonicalUrl} @ ${info?.quality ?? session.quality}`,
        'StreamSupervisor'
      );
      const quality = info?.quality ?? session.quality;
      this.notify('started', () => this.emit('started', session.channel, quality));

      const outcome = await child.closed;
      if (session.stoppedByUser) {
        logger.debug(`Stream ${session.id} closed after user stop`, 'StreamSupervisor');
        return;
      }

      if (outcome.code !== 0) {
        const message = parseErrorMessage(outcome.stderr, outcome.stdout);
        logger.error(
          `Streamlink exited with ${outcome.code ?? outcome.signal ?? 'unknown status'}: ${message}`,
          'StreamSupervisor'
        );
        this.setState(StreamState.ERROR);
        this.reportError(`Stream failed: ${message}`, StreamErrorKind.ABNORMAL_EXIT);
      } else {
        logger.info(`Stream for ${session.channel.handle} ended`, 'StreamSupervisor');
      }
    } catch (error) {
      logger.error('Stream monitor failed', 'StreamSupervisor', error);
    } finally {
      if (!session.stoppedByUser) {
        this.finishSession(session);
      }
    }
  }

  private finishSession(session: StreamSession): void {
    if (session.finished || this.session !== session) return;
    session.finished = true;
    session.process = null;
    this.session = null;
    this.setState(StreamState.STOPPED);
    this.notify('stopped', () => this.emit('stopped'));
  }

  /**
   * Stop the running stream. Escalates to SIGKILL when the graceful stop
   * times out, then closes leftover players. Always ends in `stopped`.
   */
  async stop(): Promise<void> {
    const session = this.session;
    if (this.state !== StreamState.RUNNING || !session) {
      logger.debug(`Stop ignored: stream is ${this.state}`, 'StreamSupervisor');
      return;
    }

    this.setState(StreamState.STOPPING);
    session.stoppedByUser = true;
    logger.info(`Stopping stream for ${session.channel.handle}`, 'StreamSupervisor');

    try {
      const child = session.process;
      if (child) {
        const players =
          this.platform !== 'win32' && child.pid !== undefined
            ? await listChildPids(this.runner, child.pid)
            : [];
        await this.terminate(child);
        await this.closeMediaPlayers(players);
      }
    } catch (error) {
      logger.error('Error while stopping stream', 'StreamSupervisor', error);
    } finally {
      this.finishSession(session);
    }
  }

  private async terminate(child: LaunchedProcess): Promise<void> {
    child.kill('SIGTERM');
    if (await settlesWithin(child.exited, this.config.stopTimeoutMs)) {
      return;
    }

    logger.warn(
      `${StreamErrorKind.TERMINATION_TIMEOUT}: streamlink ignored SIGTERM for ${this.config.stopTimeoutMs} ms, sending SIGKILL`,
      'StreamSupervisor'
    );
    child.kill('SIGKILL');
    if (!(await settlesWithin(child.exited, this.config.killTimeoutMs))) {
      logger.error(`Streamlink (pid ${child.pid ?? 'unknown'}) still running after SIGKILL`, 'StreamSupervisor');
    }
  }

  private async closeMediaPlayers(playerPids: readonly number[]): Promise<void> {
    if (this.platform === 'win32') {
      for (const image of this.config.mediaPlayers) {
        const result = await this.runner.run('taskkill', ['/F', '/IM', image], { timeoutMs: 5000 });
        if (result.code === 0) {
          logger.debug(`Closed ${image}`, 'StreamSupervisor');
        }
      }
      return;
    }

    for (const pid of playerPids) {
      if (this.runner.signal(pid, 'SIGTERM')) {
        logger.debug(`Sent SIGTERM to player process ${pid}`, 'StreamSupervisor');
      }
    }
  }

  /**
   * Stop the current stream (if any) and start another. Waits
   * switchDelayMs between the two when a stream was running.
   */
  async switch(channel: ChannelReference, quality: Quality): Promise<boolean> {
    const wasRunning = this.isRunning();
    await this.stop();
    if (wasRunning && this.config.switchDelayMs > 0) {
      await delay(this.config.switchDelayMs);
    }
    return this.start(channel, quality);
  }

  async shutdown(): Promise<void> {
    await this.stop();
  }
}
