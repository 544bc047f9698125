/**
 * Configuration
 *
 * Precedence: command-line option > pbx-register.json > built-in default.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_FILE_TYPE } from '../editors/file-reference-section.js';

export const CONFIG_FILE_NAME = 'pbx-register.json';

export const DEFAULT_PROJECT_PATH = 'DockTile.xcodeproj/project.pbxproj';

/**
 * Files registered when neither the command line nor the config file lists any
 */
export const DEFAULT_FILES: readonly string[] = [
  'Models/ConfigurationModels.swift',
  'Managers/ConfigurationManager.swift',
  'Extensions/ColorExtensions.swift',
  'Views/DockTileConfigurationView.swift',
  'Views/DockTileSidebarView.swift',
  'Views/DockTileDetailView.swift',
  'Views/CustomiseTileView.swift',
  'Components/DockTileIconPreview.swift',
  'Components/ItemRowView.swift',
  'Components/ColourPickerGrid.swift',
  'Components/SymbolPickerButton.swift',
];

export const configSchema = z
  .object({
    project: z.string().min(1).optional(),
    files: z.array(z.string().min(1)).min(1).optional(),
    target: z.string().min(1).optional(),
    parentGroup: z.string().min(1).optional(),
    fileType: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof configSchema>;

/**
 * Fully resolved settings for a run
 */
export interface Settings {
  /** Absolute path of the manifest */
  projectPath: string;
  files: string[];
  target?: string;
  parentGroup?: string;
  fileType: string;
}

/**
 * Values given on the command line
 */
export interface SettingsOverrides {
  project?: string;
  files?: string[];
  target?: string;
  parentGroup?: string;
  fileType?: string;
}

/**
 * Parse and validate config file content
 *
 * @param source Shown in error messages
 */
export function parseConfig(content: string, source: string): FileConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in ${source}: ${reason}`);
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${source}: ${details}`);
  }
  return parsed.data;
}

/**
 * Load the config file. Without an explicit path, a missing
 * pbx-register.json in `cwd` means an empty config.
 */
export function loadConfig(cwd: string, configPath?: string): FileConfig {
  const resolved = path.resolve(cwd, configPath ?? CONFIG_FILE_NAME);
  if (!fs.existsSync(resolved)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    return {};
  }
  return parseConfig(fs.readFileSync(resolved, 'utf-8'), resolved);
}

/**
 * Merge command-line values, config file values and defaults.
 * The project path is resolved against `cwd`.
 */
export function resolveSettings(
  cwd: string,
  config: FileConfig,
  overrides: SettingsOverrides = {}
): Settings {
  const project = overrides.project ?? config.project ?? DEFAULT_PROJECT_PATH;
  const files =
    overrides.files && overrides.files.length > 0 ? overrides.files : config.files ?? DEFAULT_FILES;

  return {
    projectPath: path.resolve(cwd, project),
    files: [...files],
    target: overrides.target ?? config.target,
    parentGroup: overrides.parentGroup ?? config.parentGroup,
    fileType: overrides.fileType ?? config.fileType ?? DEFAULT_FILE_TYPE,
  };
}
