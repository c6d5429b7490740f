export { buildApp, type BuildAppOptions } from './app';
export { loadServiceConfig, type ScopeDefaults, type ServiceConfig } from './config/serviceConfig';
export { HttpError, mapErrorToResponse, type ErrorResponse } from './errors';
export { buildPackIndex, listPacks, PackManifestError, type PackListing } from './packs/packIndex';
export { PackWatcher, PACK_WATCH_DEBOUNCE_MS, type PackWatcherOptions, type PackWatcherState } from './packs/watcher';
export * from './runner/proxy';
export { normalizeUpsertPayload, toSessionView, type SessionView } from './sessions/normalize';
