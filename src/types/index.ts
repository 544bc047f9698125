/**
 * TypeScript interfaces for pbx-register
 */

/**
 * Manifest sections touched by the section editors
 */
export enum ManifestSection {
  BuildFile = 'PBXBuildFile',
  FileReference = 'PBXFileReference',
  Group = 'PBXGroup',
  SourcesBuildPhase = 'PBXSourcesBuildPhase',
}

/**
 * Outcome of a single section edit
 */
export enum EditStatus {
  /** Entries were spliced into the section */
  Applied = 'applied',
  /** Section found, every entry was already present */
  Unchanged = 'unchanged',
  /** Section (or its markers) not found, nothing was written */
  Skipped = 'skipped',
}

/**
 * A file to register, with the ids it gets in the manifest
 */
export interface FileEntry {
  /** Normalized relative path, e.g. "Views/ItemView.swift" */
  readonly path: string;
  /** Last path segment, used as the reference path */
  readonly filename: string;
  /** First path segment; absent for root-level files */
  readonly folder?: string;
  readonly fileRefId: string;
  readonly buildFileId: string;
  /** The reference was found in the manifest and is reused */
  readonly fileRefExists: boolean;
  /** The build file was found in the manifest and is reused */
  readonly buildFileExists: boolean;
}

/**
 * What an editor did to one section
 */
export interface SectionEdit {
  section: ManifestSection;
  status: EditStatus;
  /** Ids spliced into the section */
  added: string[];
  /** Group name, for group edits */
  group?: string;
  /** The group block was created by this edit */
  created?: boolean;
  /** Why the edit was skipped */
  message?: string;
}

/**
 * Return value of every section editor
 */
export interface EditOutcome {
  content: string;
  edits: SectionEdit[];
}

/**
 * Produces a fresh object id
 */
export type IdGenerator = () => string;

/**
 * Settings shared by the pipeline and the inspector
 */
export interface ManifestOptions {
  /** Native target whose Sources phase receives the files */
  target?: string;
  /** Group that receives new folder groups and root-level files (default: the target name) */
  parentGroup?: string;
  /**
   * Project name. Breaks ties between targets of the same product type, and is
   * the parent group when there is neither `parentGroup` nor a target.
   */
  projectName?: string;
}

/**
 * Options for an in-memory registration run
 */
export interface RegisterContentOptions extends ManifestOptions {
  /** lastKnownFileType of new references (default sourcecode.swift) */
  fileType?: string;
  generateId?: IdGenerator;
  /** Called before each pipeline step */
  onProgress?: (message: string) => void;
}

/**
 * Options for a registration run against a manifest file
 */
export interface RegisterOptions extends RegisterContentOptions {
  projectPath: string;
  files: string[];
  dryRun?: boolean;
}

/**
 * Result of an in-memory registration run
 */
export interface ContentRegistration {
  content: string;
  files: FileEntry[];
  edits: SectionEdit[];
  warnings: string[];
  /** Name of the target whose Sources phase was edited */
  target?: string;
  /** Name of the parent group used for new groups */
  parentGroup?: string;
}

/**
 * Result of a registration run
 */
export interface RegisterResult {
  projectPath: string;
  files: FileEntry[];
  edits: SectionEdit[];
  warnings: string[];
  target?: string;
  parentGroup?: string;
  dryRun: boolean;
  /** Whether the manifest was rewritten */
  written: boolean;
  duration: number;
}

/**
 * Registration status of one path, as reported by the inspector
 */
export interface FileStatus {
  path: string;
  fileRefId?: string;
  buildFileId?: string;
  inGroup: boolean;
  inBuildPhase: boolean;
}

/**
 * Registration status of a list of paths in a manifest buffer
 */
export interface ContentInspection {
  target?: string;
  files: FileStatus[];
  /** Every path has a reference in its group, a build file and a build phase slot */
  complete: boolean;
}

/**
 * Result of an inspection of a manifest file
 */
export interface InspectResult extends ContentInspection {
  projectPath: string;
}

/**
 * Output format options
 */
export enum OutputFormat {
  Text = 'text',
  JSON = 'json',
}
