/**
 * StreamSupervisor lifecycle tests
 *
 * The process runner is an in-memory fake, so these tests cover state
 * transitions, event ordering and termination escalation without spawning
 * anything.
 */
import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import type { MockProxy } from 'jest-mock-extended';
import { StreamSupervisor, parseErrorMessage, FRIENDLY_ERRORS } from '../stream_supervisor';
import { StreamlinkService } from '../streamlink';
import { StreamErrorKind } from '../../types/events';
import { StreamState } from '../../../types/stream';
import type { ViewerConfig } from '../../../config/types/viewer';
import type { ProcessRunner } from '../../utils/process_utils';
import {
  channel,
  createFakeProcess,
  createMockConfig,
  createMockRunner,
  okResult,
  type FakeProcess
} from '../../../__tests__/helpers/mock-factory';
import { ExecutionTracker, flushPromises } from '../../../__tests__/helpers/async-utils';

jest.mock('../logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  }
}));

const XQC = channel('xqc');
const SHROUD = channel('shroud');

describe('StreamSupervisor', () => {
  let config: ViewerConfig;
  let runner: MockProxy<ProcessRunner>;
  let proc: FakeProcess;
  let tracker: ExecutionTracker;

  function createSupervisor(platform: NodeJS.Platform = 'linux'): StreamSupervisor {
    const streamlink = new StreamlinkService(config.streamlink, runner, platform);
    const supervisor = new StreamSupervisor(streamlink, config.supervisor, runner, platform);
    supervisor.on('started', (ch, quality) => tracker.record(`started:${ch.handle}:${quality}`));
    supervisor.on('stopped', () => tracker.record('stopped'));
    supervisor.on('error', (message, kind) => tracker.record(`error:${kind}:${message}`));
    supervisor.on('stateChanged', (state) => tracker.record(`state:${state}`));
    return supervisor;
  }

  async function startRunning(supervisor: StreamSupervisor, ch = XQC): Promise<void> {
    await expect(supervisor.start(ch, 'best')).resolves.toBe(true);
    await flushPromises();
    expect(supervisor.getState()).toBe(StreamState.RUNNING);
  }

  beforeEach(() => {
    config = createMockConfig();
    runner = createMockRunner();
    proc = createFakeProcess();
    runner.launch.mockReturnValue(proc);
    tracker = new ExecutionTracker();
  });

  describe('start', () => {
    test('launches streamlink and reports started', async () => {
      const supervisor = createSupervisor();
      await startRunning(supervisor);

      expect(runner.launch).toHaveBeenCalledWith(
        'streamlink',
        ['--twitch-proxy-playlist=https://eu.luminous.dev', 'https://www.twitch.tv/xqc', 'best'],
        { outputLimitBytes: 64 * 1024 }
      );
      expect(tracker.getEvents()).toEqual(['state:starting', 'state:running', 'started:xqc:best']);
      expect(supervisor.isRunning()).toBe(true);
    });

    test('exposes a session snapshot without the process', async () => {
      const supervisor = createSupervisor();
      await startRunning(supervisor);

      const session = supervisor.getSession();
      expect(session).toEqual({
        channel: XQC,
        quality: 'best',
        state: StreamState.RUNNING,
        startedAt: expect.any(Number)
      });
      expect(session).not.toHaveProperty('process');
    });

    test('allows only one of two back-to-back starts', async () => {
      const supervisor = createSupervisor();
      const results = await Promise.all([supervisor.start(XQC, 'best'), supervisor.start(SHROUD, 'best')]);

      expect(results).toEqual([true, false]);
      expect(runner.launch).toHaveBeenCalledTimes(1);
    });

    test('rejects start while a stream is running', async () => {
      const supervisor = createSupervisor();
      await startRunning(supervisor);

      await expect(supervisor.start(SHROUD, '720p')).resolves.toBe(false);
      expect(runner.launch).toHaveBeenCalledTimes(1);
    });

    test('reports a missing streamlink without changing state', async () => {
      runner.run.mockResolvedValue({ code: null, stdout: '', stderr: '', error: new Error('ENOENT') });
      const supervisor = createSupervisor();

      await expect(supervisor.start(XQC, 'best')).resolves.toBe(false);

      expect(tracker.getEvents()).toEqual([
        `error:${StreamErrorKind.TOOL_UNAVAILABLE}:Streamlink not found. Please install Streamlink.`
      ]);
      expect(supervisor.getState()).toBe(StreamState.STOPPED);
      expect(runner.launch).not.toHaveBeenCalled();
    });

    test('does not throw when nobody listens for errors', async () => {
      runner.run.mockResolvedValue({ code: 1, stdout: '', stderr: '' });
      const streamlink = new StreamlinkService(config.streamlink, runner, 'linux');
      const supervisor = new StreamSupervisor(streamlink, config.supervisor, runner, 'linux');

      await expect(supervisor.start(XQC, 'best')).resolves.toBe(false);
    });

    test('keeps the session when a started listener throws', async () => {
      const supervisor = createSupervisor();
      supervisor.on('started', () => {
        throw new Error('listener failed');
      });
      await startRunning(supervisor);

      await expect(supervisor.start(SHROUD, 'best')).resolves.toBe(false);
      expect(runner.launch).toHaveBeenCalledTimes(1);

      await supervisor.stop();

      expect(proc.signals).toEqual(['SIGTERM']);
      expect(supervisor.getState()).toBe(StreamState.STOPPED);
      expect(tracker.getEvents().filter((event) => event === 'stopped')).toHaveLength(1);
    });

    test('keeps starting when a stateChanged listener throws', async () => {
      const supervisor = createSupervisor();
      supervisor.on('stateChanged', () => {
        throw new Error('listener failed');
      });
      await startRunning(supervisor);

      expect(tracker.getEvents()).toEqual(['state:starting', 'state:running', 'started:xqc:best']);
    });

    test('reports a spawn failure and returns to stopped', async () => {
      proc = createFakeProcess({ autoSpawn: false });
      runner.launch.mockReturnValue(proc);
      const supervisor = createSupervisor();

      await supervisor.start(XQC, 'best');
      proc.failSpawn(new Error('spawn streamlink ENOENT'));
      await supervisor.waitForIdle();

      expect(tracker.getEvents()).toEqual([
        'state:starting',
        'state:error',
        `error:${StreamErrorKind.SPAWN_FAILURE}:Failed to start stream: spawn streamlink ENOENT`,
        'state:stopped',
        'stopped'
      ]);
    });
  });

  describe('process exit', () => {
    test('maps a failing exit to a friendly error', async () => {
      const supervisor = createSupervisor();
      await startRunning(supervisor);
      tracker.clear();

      proc.exit(1, null, { stderr: 'error: No playable streams found on this URL: https://www.twitch.tv/xqc' });
      await supervisor.waitForIdle();

      expect(tracker.getEvents()).toEqual([
        'state:error',
        `error:${StreamErrorKind.ABNORMAL_EXIT}:Stream failed: Stream not found or offline`,
        'state:stopped',
        'stopped'
      ]);
      expect(supervisor.getSession()).toBeNull();
    });

    test('a clean exit stops without an error', async () => {
      const supervisor = createSupervisor();
      await startRunning(supervisor);
      tracker.clear();

      proc.exit(0);
      await supervisor.waitForIdle();

      expect(tracker.getEvents()).toEqual(['state:stopped', 'stopped']);
    });

    test('a new stream can start after the previous one ended', async () => {
      const supervisor = createSupervisor();
      await startRunning(supervisor);
      proc.exit(0);
      await supervisor.waitForIdle();

      runner.launch.mockReturnValue(createFakeProcess());
      await startRunning(supervisor, SHROUD);
    });
  });

  describe('stop', () => {
    test('terminates gracefully and emits stopped once', async () => {
      const supervisor = createSupervisor();
      await startRunning(supervisor);
      tracker.clear();

      await supervisor.stop();
      await flushPromises();

      expect(proc.signals).toEqual(['SIGTERM']);
      expect(tracker.getEvents()).toEqual(['state:stopping', 'state:stopped', 'stopped']);
      expect(supervisor.getState()).toBe(StreamState.STOPPED);
    });

    test('escalates to SIGKILL when SIGTERM is ignored', async () => {
      proc = createFakeProcess({ exitOn: ['SIGKILL'] });
      runner.launch.mockReturnValue(proc);
      const supervisor = createSupervisor();
      await startRunning(supervisor);

      await supervisor.stop();

      expect(proc.signals).toEqual(['SIGTERM', 'SIGKILL']);
      expect(supervisor.getState()).toBe(StreamState.STOPPED);
    });

    test('still ends stopped when the process never exits', async () => {
      proc = createFakeProcess({ exitOn: [] });
      runner.launch.mockReturnValue(proc);
      const supervisor = createSupervisor();
      await startRunning(supervisor);
      tracker.clear();

      await supervisor.stop();

      expect(proc.signals).toEqual(['SIGTERM', 'SIGKILL']);
      expect(tracker.getEvents()).toEqual(['state:stopping', 'state:stopped', 'stopped']);
      expect(supervisor.getSession()).toBeNull();
    });

    test('signals player children found before termination', async () => {
      runner.run.mockImplementation(async (file) =>
        file === 'pgrep' ? { ...okResult, stdout: '555\n556\n' } : okResult
      );
      const supervisor = createSupervisor();
      await startRunning(supervisor);

      await supervisor.stop();

      expect(runner.run).toHaveBeenCalledWith('pgrep', ['-P', '4321'], { timeoutMs: 2000 });
      expect(runner.signal.mock.calls).toEqual([
        [555, 'SIGTERM'],
        [556, 'SIGTERM']
      ]);
    });

    test('closes media players with taskkill on Windows', async () => {
      const supervisor = createSupervisor('win32');
      await startRunning(supervisor);

      await supervisor.stop();

      const taskkills = runner.run.mock.calls.filter((call) => call[0] === 'taskkill').map((call) => call[1]);
      expect(taskkills).toEqual([
        ['/F', '/IM', 'vlc.exe'],
        ['/F', '/IM', 'wmplayer.exe'],
        ['/F', '/IM', 'mpv.exe']
      ]);
      expect(runner.run).not.toHaveBeenCalledWith('pgrep', expect.anything(), expect.anything());
    });

    test('is a no-op when nothing is running', async () => {
      const supervisor = createSupervisor();
      await supervisor.stop();

      expect(tracker.getEvents()).toEqual([]);
    });

    test('rejects start while stopping', async () => {
      proc = createFakeProcess({ exitOn: [] });
      runner.launch.mockReturnValue(proc);
      const supervisor = createSupervisor();
      await startRunning(supervisor);

      const stopping = supervisor.stop();
      expect(supervisor.getState()).toBe(StreamState.STOPPING);
      await expect(supervisor.start(SHROUD, 'best')).resolves.toBe(false);
      await stopping;
    });
  });

  describe('switch', () => {
    test('stops the current stream and starts the next', async () => {
      const next = createFakeProcess({ pid: 9876 });
      runner.launch.mockReturnValueOnce(proc).mockReturnValueOnce(next);
      const supervisor = createSupervisor();
      await startRunning(supervisor);
      tracker.clear();

      await expect(supervisor.switch(SHROUD, '720p')).resolves.toBe(true);
      await flushPromises();

      expect(proc.signals).toEqual(['SIGTERM']);
      expect(tracker.getEvents()).toEqual([
        'state:stopping',
        'state:stopped',
        'stopped',
        'state:starting',
        'state:running',
        'started:shroud:720p'
      ]);
      expect(supervisor.getSession()?.channel).toEqual(SHROUD);
    });

    test('starts directly when nothing is running', async () => {
      const supervisor = createSupervisor();
      await expect(supervisor.switch(XQC, 'best')).resolves.toBe(true);
      expect(runner.launch).toHaveBeenCalledTimes(1);
    });
  });

  describe('parseErrorMessage', () => {
    test.each(FRIENDLY_ERRORS.map(([pattern, message]) => [pattern, message]))(
      'maps "%s"',
      (pattern, message) => {
        expect(parseErrorMessage(`[cli][error] ${pattern} for this stream`)).toBe(message);
      }
    );

    test('searches stdout as well', () => {
      expect(parseErrorMessage('', 'error: 403 Client Error: Forbidden')).toBe(
        'Stream is subscriber-only or restricted'
      );
    });

    test('passes unknown text through trimmed', () => {
      expect(parseErrorMessage('  something odd happened \n', '')).toBe('something odd happened');
      expect(parseErrorMessage('first', 'second')).toBe('first\nsecond');
    });

    test('falls back for empty output', () => {
      expect(parseErrorMessage('', '')).toBe('Unknown error occurred');
      expect(parseErrorMessage(' \n ', '\n')).toBe('Unknown error occurred');
    });
  });
});
