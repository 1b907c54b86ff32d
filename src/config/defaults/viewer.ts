import type { Settings, ViewerConfigInput } from '../types/viewer.js';
import { APP_VERSION } from '../paths.js';

export const defaultViewerConfig: ViewerConfigInput = {
  streamlink: {
    pathLookup: ['streamlink', 'streamlink.exe'],
    installPaths: {
      win32: [
        'C:\\Program Files\\Streamlink\\bin\\streamlink.exe',
        'C:\\Program Files (x86)\\Streamlink\\bin\\streamlink.exe'
      ],
      darwin: ['/opt/homebrew/bin/streamlink', '/usr/local/bin/streamlink'],
      linux: ['/usr/bin/streamlink', '/usr/local/bin/streamlink']
    },
    userPaths: {
      win32: [
        '~\\AppData\\Local\\Programs\\Streamlink\\bin\\streamlink.exe',
        '~\\AppData\\Roaming\\Python\\Scripts\\streamlink.exe'
      ],
      darwin: ['~/.local/bin/streamlink', '~/Library/Python/3.12/bin/streamlink'],
      linux: ['~/.local/bin/streamlink']
    },
    probeTimeoutMs: 5000,
    proxyUrl: 'https://eu.luminous.dev'
  },
  supervisor: {
    stopTimeoutMs: 3000,
    killTimeoutMs: 2000,
    switchDelayMs: 500,
    mediaPlayers: ['vlc.exe', 'wmplayer.exe', 'mpv.exe']
  },
  status: {
    cacheDurationMs: 60_000,
    cacheSize: 50,
    requestTimeoutMs: 10_000,
    bodyScanLimit: 0,
    concurrency: 5
  }
};

export const defaultSettings: Settings = {
  last_url: '',
  last_quality: 'best',
  last_streamer_name: '',
  quick_swap_streams: [],
  app_version: APP_VERSION
};
