import type { StreamlinkConfig } from '../../config/types/viewer.js';
import { expandHome } from '../../config/paths.js';
import { DEFAULT_QUALITY, isQuality, type ChannelReference, type Quality } from '../../types/stream.js';
import { hiddenProcessRunner, type ProcessRunner } from '../utils/process_utils.js';
import { logger } from './logger.js';

export interface StreamInfo {
  url: string;
  quality: Quality;
}

const URL_TOKEN = /^https?:\/\//i;

/**
 * Finds a working streamlink executable and builds its command lines.
 */
export class StreamlinkService {
  private resolvedPath: string | null = null;
  private available: boolean | null = null;
  private probe: Promise<boolean> | null = null;

  constructor(
    private readonly config: StreamlinkConfig,
    private readonly runner: ProcessRunner = hiddenProcessRunner,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  /** Ordered, de-duplicated list of executables to try */
  getCandidates(): string[] {
    const key = this.platform === 'win32' || this.platform === 'darwin' ? this.platform : 'linux';
    const lookup = this.platform === 'win32'
      ? this.config.pathLookup
      : this.config.pathLookup.filter((name) => !name.toLowerCase().endsWith('.exe'));

    const candidates = [
      ...(this.config.path ? [expandHome(this.config.path)] : []),
      ...lookup,
      ...this.config.installPaths[key],
      ...this.config.userPaths[key].map(expandHome)
    ];
    return [...new Set(candidates)];
  }

  /**
   * Probe candidates in order and cache the first that answers `--version`.
   * Concurrent callers share a single probe.
   */
  discover(): Promise<boolean> {
    if (!this.probe) {
      this.probe = this.runProbe().finally(() => {
        this.probe = null;
      });
    }
    return this.probe;
  }

  private async runProbe(): Promise<boolean> {
    for (const candidate of this.getCandidates()) {
      try {
        const result = await this.runner.run(candidate, ['--version'], {
          timeoutMs: this.config.probeTimeoutMs
        });
        if (result.code === 0) {
          this.resolvedPath = candidate;
          this.available = true;
          logger.info(`Found streamlink at ${candidate}: ${result.stdout.trim()}`, 'Streamlink');
          return true;
        }
        logger.debug(`Candidate ${candidate} not usable (exit ${result.code ?? 'none'})`, 'Streamlink');
      } catch (error) {
        logger.debug(`Probe of ${candidate} failed: ${error instanceof Error ? error.message : String(error)}`, 'Streamlink');
      }
    }

    this.resolvedPath = null;
    this.available = false;
    logger.warn('Streamlink not found in PATH or known install locations', 'Streamlink');
    return false;
  }

  async isAvailable(): Promise<boolean> {
    if (this.available !== null) return this.available;
    return this.discover();
  }

  /** Cached availability, or null before the first probe */
  isAvailableSync(): boolean | null {
    return this.available;
  }

  getPath(): string | null {
    return this.resolvedPath;
  }

  buildCommand(channel: ChannelReference, quality: Quality): string[] {
    return [
      this.resolvedPath ?? 'streamlink',
      `--twitch-proxy-playlist=${this.config.proxyUrl}`,
      channel.canonicalUrl,
      quality
    ];
  }

  /**
   * Recover the stream URL and quality from a command line built by
   * buildCommand, or null if it carries no URL.
   */
  extractStreamInfo(argv: readonly string[]): StreamInfo | null {
    const urlIndex = argv.findIndex((token) => URL_TOKEN.test(token));
    if (urlIndex === -1) return null;
    const next = argv[urlIndex + 1];
    return { url: argv[urlIndex], quality: isQuality(next) ? next : DEFAULT_QUALITY };
  }
}
