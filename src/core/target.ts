/**
 * Target selection
 */
import * as path from 'path';
import { ConfigError } from './errors.js';
import {
  findSourcesBuildPhase,
  getMainAppTarget,
  parsePbxprojTargets,
} from '../parsers/pbxproj-parser.js';
import type { ListBlock, PbxprojTarget } from '../parsers/pbxproj-parser.js';

/**
 * Pick the target whose Sources phase receives new files.
 *
 * A named target must exist; without a name the main app target is used.
 * Returns undefined when the manifest declares no native target.
 */
export function selectTarget(
  content: string,
  name?: string,
  projectName?: string
): PbxprojTarget | undefined {
  const targets = parsePbxprojTargets(content);

  if (name) {
    const target = targets.find(t => t.name === name);
    if (!target) {
      const available = targets.map(t => t.name).join(', ') || 'none';
      throw new ConfigError(`Unknown target "${name}". Available targets: ${available}`);
    }
    return target;
  }

  return getMainAppTarget(targets, projectName);
}

/**
 * Locate the Sources phase listed by `target`, or the first one in the file
 */
export function findTargetSourcesPhase(
  content: string,
  target?: PbxprojTarget
): ListBlock | undefined {
  if (!target) {
    return findSourcesBuildPhase(content);
  }

  for (const phase of target.buildPhases) {
    const block = findSourcesBuildPhase(content, phase.id);
    if (block) {
      return block;
    }
  }
  return undefined;
}

/**
 * "DockTile" for "DockTile.xcodeproj/project.pbxproj"
 */
export function projectNameFromPath(projectPath: string): string | undefined {
  const container = path.basename(path.dirname(projectPath));
  if (!container.endsWith('.xcodeproj')) {
    return undefined;
  }
  return path.basename(container, '.xcodeproj');
}
