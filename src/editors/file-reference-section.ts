/**
 * PBXFileReference section editor
 */
import { ManifestSection } from '../types/index.js';
import type { EditOutcome, FileEntry } from '../types/index.js';
import { quotePbxString } from '../parsers/pbxproj-parser.js';
import { appendSectionEntries } from './base.js';

export const DEFAULT_FILE_TYPE = 'sourcecode.swift';

/**
 * Render the file reference line. Every reference is relative to its group.
 */
export function renderFileReference(entry: FileEntry, fileType: string = DEFAULT_FILE_TYPE): string {
  return `\t\t${entry.fileRefId} /* ${entry.filename} */ = {isa = PBXFileReference; lastKnownFileType = ${quotePbxString(fileType)}; path = ${quotePbxString(entry.filename)}; sourceTree = "<group>"; };`;
}

/**
 * Add a file reference for every entry that does not have one yet
 */
export function addFileReferences(
  content: string,
  entries: FileEntry[],
  fileType: string = DEFAULT_FILE_TYPE
): EditOutcome {
  const pending = entries.filter(entry => !entry.fileRefExists);
  return appendSectionEntries(
    content,
    ManifestSection.FileReference,
    pending.map(entry => renderFileReference(entry, fileType)),
    pending.map(entry => entry.fileRefId)
  );
}
