export * from './types/stream.js';
export * from './server/types/events.js';
export * from './server/utils/url_validator.js';
export { BoundedCache } from './server/utils/bounded_cache.js';
export { TimeoutError, withPromiseTimeout, mapWithConcurrency } from './server/utils/async_helpers.js';
export { hiddenProcessRunner } from './server/utils/process_utils.js';
export type { ProcessRunner, LaunchedProcess, CommandResult } from './server/utils/process_utils.js';
export { StreamlinkService } from './server/services/streamlink.js';
export { FetchHttpClient } from './server/services/http_client.js';
export type { HttpClient, HttpRequestOptions, HttpTextResponse } from './server/services/http_client.js';
export { StatusChecker, classifyPage } from './server/services/status_checker.js';
export { StreamSupervisor, parseErrorMessage } from './server/services/stream_supervisor.js';
export { SettingsStore } from './server/services/settings_store.js';
export { FavoritesRegistry } from './server/services/favorites.js';
export { logger, Logger, LogLevel } from './server/services/logger.js';
export { StreamViewer, createStreamViewer } from './server/stream_viewer.js';
export { loadViewerConfig } from './config/loader.js';
export type { ViewerConfig, Settings } from './config/types/viewer.js';
