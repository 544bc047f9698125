/**
 * Splicing helpers shared by the section editors
 */
import { EditStatus } from '../types/index.js';
import type { EditOutcome, ManifestSection, SectionEdit } from '../types/index.js';
import { findSection } from '../parsers/pbxproj-parser.js';
import type { ListBlock } from '../parsers/pbxproj-parser.js';

const LIST_ITEM_INDENT = '\t\t\t\t';
const LIST_CLOSE_INDENT = '\t\t\t';

/**
 * "1 entry", "2 entries"
 */
export function pluralize(count: number, singular: string, plural: string): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * Helper to create a skipped edit
 */
export function skippedEdit(
  section: ManifestSection,
  message: string,
  group?: string
): SectionEdit {
  return { section, status: EditStatus.Skipped, added: [], group, message };
}

/**
 * Append one line per entry at the end of a Begin/End delimited section.
 * `lines` and `ids` are parallel; `ids` end up in the edit's `added` list.
 */
export function appendSectionEntries(
  content: string,
  section: ManifestSection,
  lines: string[],
  ids: string[]
): EditOutcome {
  const range = findSection(content, section);
  if (!range) {
    return {
      content,
      edits: [
        skippedEdit(
          section,
          `${section} section not found; skipped ${pluralize(lines.length, 'entry', 'entries')}`
        ),
      ],
    };
  }

  if (lines.length === 0) {
    return { content, edits: [{ section, status: EditStatus.Unchanged, added: [] }] };
  }

  const existing = range.body.trimEnd();
  const body = `${existing ? `${existing}\n` : ''}${lines.join('\n')}\n`;

  return {
    content: content.slice(0, range.start) + body + content.slice(range.end),
    edits: [{ section, status: EditStatus.Applied, added: ids }],
  };
}

/**
 * Append items ("ID /* name *\/,") to a parenthesized list, one per line
 */
export function appendListItems(content: string, block: ListBlock, items: string[]): string {
  const existing = block.items.trimEnd();
  const added = items.map(item => `\n${LIST_ITEM_INDENT}${item}`).join('');
  return content.slice(0, block.start) + existing + added + `\n${LIST_CLOSE_INDENT}` + content.slice(block.end);
}
