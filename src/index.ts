export * from './pdf/index.js';
export { RegionSession, NO_REGIONS_NOTICE, defaultDebugPngPath } from './region-session.js';
export type { BackendFactory, RegionSessionOptions } from './region-session.js';
export { DocumentLoadError } from './errors.js';
export { DEFAULT_SETTINGS } from './types.js';
export type { RegionSettings } from './types.js';
export { validateSettings, isSettingsInput } from './services/settings-validator.js';
export type { SettingsInput } from './services/settings-validator.js';
