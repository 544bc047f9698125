/**
 * PBXBuildFile section editor
 */
import { ManifestSection } from '../types/index.js';
import type { EditOutcome, FileEntry } from '../types/index.js';
import { appendSectionEntries } from './base.js';

/**
 * Render the build file line linking `entry.buildFileId` to its reference
 */
export function renderBuildFile(entry: FileEntry): string {
  return `\t\t${entry.buildFileId} /* ${entry.filename} in Sources */ = {isa = PBXBuildFile; fileRef = ${entry.fileRefId} /* ${entry.filename} */; };`;
}

/**
 * Add a build file for every entry that does not have one yet
 */
export function addBuildFiles(content: string, entries: FileEntry[]): EditOutcome {
  const pending = entries.filter(entry => !entry.buildFileExists);
  return appendSectionEntries(
    content,
    ManifestSection.BuildFile,
    pending.map(renderBuildFile),
    pending.map(entry => entry.buildFileId)
  );
}
