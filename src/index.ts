/**
 * pbx-register - register source files in Xcode project manifests
 *
 * Main library entry point for programmatic usage
 */

// Types
export * from './types/index.js';

// Parsers
export * from './parsers/index.js';

// Editors
export * from './editors/index.js';

// Core
export { registerFiles, registerInContent, collectWarnings } from './core/register.js';
export { inspectRegistration, inspectProject } from './core/inspect.js';
export { planFileEntries, normalizeFilePath, findRegisteredReference, findReusableBuildFile } from './core/planner.js';
export { selectTarget, findTargetSourcesPhase, projectNameFromPath } from './core/target.js';
export { readManifest, writeManifest } from './core/manifest-io.js';
export { generateXcodeId, ID_PREFIX } from './core/ids.js';
export { ManifestReadError, ManifestWriteError, ConfigError } from './core/errors.js';

// Config
export {
  loadConfig,
  parseConfig,
  resolveSettings,
  configSchema,
  CONFIG_FILE_NAME,
  DEFAULT_FILES,
  DEFAULT_PROJECT_PATH,
} from './config/index.js';
export type { FileConfig, Settings, SettingsOverrides } from './config/index.js';

// Formatters
export { format, formatInspection, formatText, formatInspectionText, formatJSON } from './formatters/index.js';
