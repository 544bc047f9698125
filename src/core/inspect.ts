/**
 * Registration status checks
 */
import type { ContentInspection, FileStatus, InspectResult, ManifestOptions } from '../types/index.js';
import { findBuildFileIds, parseObjectRefs } from '../parsers/pbxproj-parser.js';
import { findRegisteredReference, normalizeFilePath } from './planner.js';
import { findTargetSourcesPhase, projectNameFromPath, selectTarget } from './target.js';
import { readManifest } from './manifest-io.js';

/**
 * Report, for each path, which parts of its registration exist in `content`
 */
export function inspectRegistration(
  content: string,
  paths: string[],
  options: ManifestOptions = {}
): ContentInspection {
  const target = selectTarget(content, options.target, options.projectName);
  const parentGroup = options.parentGroup ?? target?.name ?? options.projectName;
  const phase = findTargetSourcesPhase(content, target);
  const phaseIds = new Set(phase ? parseObjectRefs(phase.items).map(ref => ref.id) : []);

  const files: FileStatus[] = [];
  const seen = new Set<string>();

  for (const rawPath of paths) {
    const filePath = normalizeFilePath(rawPath);
    if (seen.has(filePath)) continue;
    seen.add(filePath);

    const segments = filePath.split('/');
    const filename = segments[segments.length - 1];
    const owner = segments.length > 1 ? segments[0] : parentGroup;

    const fileRefId = owner ? findRegisteredReference(content, filename, owner) : undefined;
    const buildFileIds = fileRefId ? findBuildFileIds(content, fileRefId) : [];
    const buildFileId: string | undefined = buildFileIds.find(id => phaseIds.has(id)) ?? buildFileIds[0];

    files.push({
      path: filePath,
      fileRefId,
      buildFileId,
      inGroup: fileRefId !== undefined,
      inBuildPhase: buildFileId !== undefined && phaseIds.has(buildFileId),
    });
  }

  return {
    target: target?.name,
    files,
    complete: files.every(file => file.inGroup && file.inBuildPhase),
  };
}

/**
 * Inspect the manifest file at `projectPath`
 */
export function inspectProject(
  projectPath: string,
  paths: string[],
  options: ManifestOptions = {}
): InspectResult {
  const content = readManifest(projectPath);
  const inspection = inspectRegistration(content, paths, {
    ...options,
    projectName: options.projectName ?? projectNameFromPath(projectPath),
  });
  return { projectPath, ...inspection };
}
