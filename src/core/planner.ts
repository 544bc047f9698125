/**
 * Turns input paths into FileEntries
 *
 * A file registered by an earlier run keeps its ids: its reference is found by
 * filename among the children of the group it belongs to, and its build file
 * by fileRef. A build file listed only in another target's Sources phase is not
 * reused, since a build file belongs to exactly one phase. Everything else gets
 * fresh ids.
 */
import type { FileEntry, IdGenerator } from '../types/index.js';
import { ConfigError } from './errors.js';
import {
  findBuildFileIds,
  findFileReferenceIds,
  findGroup,
  findSourcesBuildPhases,
  parseObjectRefs,
} from '../parsers/pbxproj-parser.js';
import type { ListBlock } from '../parsers/pbxproj-parser.js';

export interface PlanOptions {
  generateId: IdGenerator;
  /** Group holding root-level files */
  parentGroup?: string;
  /** Sources phase that will receive the build files */
  sourcesPhase?: ListBlock;
}

function listedIds(block: ListBlock): Set<string> {
  return new Set(parseObjectRefs(block.items).map(ref => ref.id));
}

/**
 * Build file of `fileRefId` that may be added to `sourcesPhase`: one already
 * listed there, else one no Sources phase lists yet
 */
export function findReusableBuildFile(
  content: string,
  fileRefId: string,
  sourcesPhase?: ListBlock
): string | undefined {
  const candidates = findBuildFileIds(content, fileRefId);
  if (candidates.length === 0) {
    return undefined;
  }

  const inTarget = sourcesPhase ? listedIds(sourcesPhase) : new Set<string>();
  const listed = new Set(findSourcesBuildPhases(content).flatMap(phase => [...listedIds(phase)]));

  return candidates.find(id => inTarget.has(id)) ?? candidates.find(id => !listed.has(id));
}

/**
 * Normalize a relative file path ("./Views\\A.swift" -> "Views/A.swift")
 */
export function normalizeFilePath(rawPath: string): string {
  const segments = rawPath
    .replace(/\\/g, '/')
    .split('/')
    .filter(segment => segment !== '' && segment !== '.');

  if (segments.length === 0) {
    throw new ConfigError(`Invalid file path: "${rawPath}"`);
  }
  if (segments.includes('..')) {
    throw new ConfigError(`File path must not leave the source folder: "${rawPath}"`);
  }
  return segments.join('/');
}

/**
 * Id of a reference to `filename` that is already a child of `groupName`
 */
export function findRegisteredReference(
  content: string,
  filename: string,
  groupName: string
): string | undefined {
  const group = findGroup(content, groupName);
  if (!group) {
    return undefined;
  }

  const children = new Set(parseObjectRefs(group.items).map(ref => ref.id));
  return findFileReferenceIds(content, filename).find(id => children.has(id));
}

/**
 * Build one FileEntry per distinct path, in input order
 */
export function planFileEntries(
  content: string,
  paths: string[],
  options: PlanOptions
): FileEntry[] {
  const entries: FileEntry[] = [];
  const seen = new Set<string>();

  for (const rawPath of paths) {
    const filePath = normalizeFilePath(rawPath);
    if (seen.has(filePath)) continue;
    seen.add(filePath);

    const segments = filePath.split('/');
    const filename = segments[segments.length - 1];
    const folder = segments.length > 1 ? segments[0] : undefined;

    const owner = folder ?? options.parentGroup;
    const existingRef = owner ? findRegisteredReference(content, filename, owner) : undefined;
    const fileRefId = existingRef ?? options.generateId();

    const existingBuildFile = existingRef
      ? findReusableBuildFile(content, existingRef, options.sourcesPhase)
      : undefined;
    const buildFileId = existingBuildFile ?? options.generateId();

    entries.push({
      path: filePath,
      filename,
      folder,
      fileRefId,
      buildFileId,
      fileRefExists: existingRef !== undefined,
      buildFileExists: existingBuildFile !== undefined,
    });
  }

  return entries;
}
