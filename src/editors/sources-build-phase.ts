/**
 * PBXSourcesBuildPhase editor
 */
import { EditStatus, ManifestSection } from '../types/index.js';
import type { EditOutcome, FileEntry } from '../types/index.js';
import type { PbxprojTarget } from '../parsers/pbxproj-parser.js';
import { findTargetSourcesPhase } from '../core/target.js';
import { appendListItems, pluralize, skippedEdit } from './base.js';

/**
 * Add every entry's build file to the Sources phase of `target`
 * (or the first Sources phase when there is no target).
 * Build ids already contained in the files list are skipped.
 */
export function addBuildPhaseMemberships(
  content: string,
  entries: FileEntry[],
  target?: PbxprojTarget
): EditOutcome {
  const phase = findTargetSourcesPhase(content, target);
  if (!phase) {
    const owner = target ? ` of target "${target.name}"` : '';
    return {
      content,
      edits: [
        skippedEdit(
          ManifestSection.SourcesBuildPhase,
          `Sources build phase${owner} not found; skipped ${pluralize(entries.length, 'entry', 'entries')}`
        ),
      ],
    };
  }

  const missing = entries.filter(entry => !phase.items.includes(entry.buildFileId));
  if (missing.length === 0) {
    return {
      content,
      edits: [{ section: ManifestSection.SourcesBuildPhase, status: EditStatus.Unchanged, added: [] }],
    };
  }

  return {
    content: appendListItems(
      content,
      phase,
      missing.map(entry => `${entry.buildFileId} /* ${entry.filename} in Sources */,`)
    ),
    edits: [
      {
        section: ManifestSection.SourcesBuildPhase,
        status: EditStatus.Applied,
        added: missing.map(entry => entry.buildFileId),
      },
    ],
  };
}
