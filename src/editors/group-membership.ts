/**
 * PBXGroup editor
 *
 * Files are grouped by their first path segment. A folder group that already
 * exists receives the missing children; otherwise a new group is appended to
 * the PBXGroup section and registered in the parent group. Root-level files
 * go straight into the parent group.
 *
 * Membership is checked by substring containment in the children list, so an
 * id that happens to occur inside another child's text counts as present.
 */
import { EditStatus, ManifestSection } from '../types/index.js';
import type { EditOutcome, FileEntry, IdGenerator, SectionEdit } from '../types/index.js';
import { findGroup, quotePbxString } from '../parsers/pbxproj-parser.js';
import { appendListItems, pluralize, skippedEdit } from './base.js';

const GROUP_SECTION_END = '/* End PBXGroup section */';

export interface GroupEditOptions {
  generateId: IdGenerator;
  /** Group that receives new folder groups and root-level files */
  parentGroup?: string;
}

interface ChildRef {
  id: string;
  name: string;
}

/**
 * Partition entries by folder, keeping the order folders first appear in
 */
export function partitionByFolder(entries: FileEntry[]): Map<string, FileEntry[]> {
  const partitions = new Map<string, FileEntry[]>();
  for (const entry of entries) {
    if (!entry.folder) continue;
    const members = partitions.get(entry.folder) ?? [];
    members.push(entry);
    partitions.set(entry.folder, members);
  }
  return partitions;
}

/**
 * Render a new group block, terminated by a newline
 */
export function renderGroup(groupId: string, folder: string, members: FileEntry[]): string {
  return [
    `\t\t${groupId} /* ${folder} */ = {`,
    '\t\t\tisa = PBXGroup;',
    '\t\t\tchildren = (',
    ...members.map(entry => `\t\t\t\t${entry.fileRefId} /* ${entry.filename} */,`),
    '\t\t\t);',
    `\t\t\tpath = ${quotePbxString(folder)};`,
    '\t\t\tsourceTree = "<group>";',
    '\t\t};',
    '',
  ].join('\n');
}

/**
 * Append children to an existing group, skipping ids already present
 */
function addChildren(
  content: string,
  groupName: string,
  children: ChildRef[]
): { content: string; edit: SectionEdit } | undefined {
  const group = findGroup(content, groupName);
  if (!group) {
    return undefined;
  }

  const missing = children.filter(child => !group.items.includes(child.id));
  if (missing.length === 0) {
    return {
      content,
      edit: { section: ManifestSection.Group, status: EditStatus.Unchanged, added: [], group: groupName },
    };
  }

  return {
    content: appendListItems(content, group, missing.map(child => `${child.id} /* ${child.name} */,`)),
    edit: {
      section: ManifestSection.Group,
      status: EditStatus.Applied,
      added: missing.map(child => child.id),
      group: groupName,
    },
  };
}

/**
 * Register children (new groups or root-level files) in the parent group
 */
function addToParent(
  content: string,
  parentGroup: string | undefined,
  children: ChildRef[],
  subject: string
): { content: string; edit: SectionEdit } {
  if (!parentGroup) {
    return {
      content,
      edit: skippedEdit(ManifestSection.Group, `No parent group to register ${subject} in`),
    };
  }

  return (
    addChildren(content, parentGroup, children) ?? {
      content,
      edit: skippedEdit(
        ManifestSection.Group,
        `Parent group "${parentGroup}" not found; ${subject} not registered`,
        parentGroup
      ),
    }
  );
}

/**
 * Put every entry's file reference into its group
 */
export function addGroupMemberships(
  content: string,
  entries: FileEntry[],
  options: GroupEditOptions
): EditOutcome {
  const edits: SectionEdit[] = [];
  let current = content;

  for (const [folder, members] of partitionByFolder(entries)) {
    const children = members.map(entry => ({ id: entry.fileRefId, name: entry.filename }));

    const existing = addChildren(current, folder, children);
    if (existing) {
      current = existing.content;
      edits.push(existing.edit);
      continue;
    }

    const sectionEnd = current.indexOf(GROUP_SECTION_END);
    if (sectionEnd === -1) {
      edits.push(
        skippedEdit(
          ManifestSection.Group,
          `PBXGroup section not found; group "${folder}" not created`,
          folder
        )
      );
      continue;
    }

    const groupId = options.generateId();
    current = current.slice(0, sectionEnd) + renderGroup(groupId, folder, members) + current.slice(sectionEnd);
    edits.push({
      section: ManifestSection.Group,
      status: EditStatus.Applied,
      added: children.map(child => child.id),
      group: folder,
      created: true,
    });

    const registration = addToParent(
      current,
      options.parentGroup,
      [{ id: groupId, name: folder }],
      `group "${folder}"`
    );
    current = registration.content;
    edits.push(registration.edit);
  }

  const rootFiles = entries.filter(entry => !entry.folder);
  if (rootFiles.length > 0) {
    const registration = addToParent(
      current,
      options.parentGroup,
      rootFiles.map(entry => ({ id: entry.fileRefId, name: entry.filename })),
      pluralize(rootFiles.length, 'root-level file', 'root-level files')
    );
    current = registration.content;
    edits.push(registration.edit);
  }

  return { content: current, edits };
}
