/**
 * Registration pipeline
 *
 * load -> plan -> PBXBuildFile -> PBXFileReference -> PBXGroup -> Sources phase -> write
 *
 * Editors run in a fixed order over one buffer. An editor that cannot find its
 * section leaves the buffer as it is and reports a skipped edit; the run goes
 * on, so a manifest can end up partially updated.
 */
import { EditStatus } from '../types/index.js';
import type {
  ContentRegistration,
  EditOutcome,
  RegisterContentOptions,
  RegisterOptions,
  RegisterResult,
  SectionEdit,
} from '../types/index.js';
import { generateXcodeId } from './ids.js';
import { planFileEntries } from './planner.js';
import { findTargetSourcesPhase, projectNameFromPath, selectTarget } from './target.js';
import { readManifest, writeManifest } from './manifest-io.js';
import { addBuildFiles } from '../editors/build-file-section.js';
import { addFileReferences } from '../editors/file-reference-section.js';
import { addGroupMemberships } from '../editors/group-membership.js';
import { addBuildPhaseMemberships } from '../editors/sources-build-phase.js';

/**
 * Messages of every skipped edit
 */
export function collectWarnings(edits: SectionEdit[]): string[] {
  return edits.flatMap(edit =>
    edit.status === EditStatus.Skipped && edit.message ? [edit.message] : []
  );
}

/**
 * Register `paths` in a manifest buffer and return the edited buffer
 */
export function registerInContent(
  content: string,
  paths: string[],
  options: RegisterContentOptions = {}
): ContentRegistration {
  const generateId = options.generateId ?? generateXcodeId;
  const progress = options.onProgress ?? (() => undefined);

  const target = selectTarget(content, options.target, options.projectName);
  const parentGroup = options.parentGroup ?? target?.name ?? options.projectName;

  progress('Planning file entries');
  const files = planFileEntries(content, paths, {
    generateId,
    parentGroup,
    sourcesPhase: findTargetSourcesPhase(content, target),
  });

  const steps: Array<[string, (buffer: string) => EditOutcome]> = [
    ['Adding PBXBuildFile entries', buffer => addBuildFiles(buffer, files)],
    ['Adding PBXFileReference entries', buffer => addFileReferences(buffer, files, options.fileType)],
    ['Adding files to groups', buffer => addGroupMemberships(buffer, files, { generateId, parentGroup })],
    ['Adding files to build phase', buffer => addBuildPhaseMemberships(buffer, files, target)],
  ];

  let current = content;
  const edits: SectionEdit[] = [];
  for (const [message, edit] of steps) {
    progress(message);
    const outcome = edit(current);
    current = outcome.content;
    edits.push(...outcome.edits);
  }

  return {
    content: current,
    files,
    edits,
    warnings: collectWarnings(edits),
    target: target?.name,
    parentGroup,
  };
}

/**
 * Register files in the manifest at `options.projectPath`
 */
export function registerFiles(options: RegisterOptions): RegisterResult {
  const startTime = Date.now();
  const progress = options.onProgress ?? (() => undefined);
  const dryRun = options.dryRun ?? false;

  progress(`Reading ${options.projectPath}`);
  const content = readManifest(options.projectPath);

  const registration = registerInContent(content, options.files, {
    ...options,
    projectName: options.projectName ?? projectNameFromPath(options.projectPath),
  });

  if (!dryRun) {
    progress(`Writing ${options.projectPath}`);
    writeManifest(options.projectPath, registration.content);
  }

  return {
    projectPath: options.projectPath,
    files: registration.files,
    edits: registration.edits,
    warnings: registration.warnings,
    target: registration.target,
    parentGroup: registration.parentGroup,
    dryRun,
    written: !dryRun,
    duration: Date.now() - startTime,
  };
}
