/**
 * Pattern-based lookups in Xcode project.pbxproj files
 *
 * Nothing here builds an object model. Each helper locates one kind of block
 * with a regular expression and reports where its interesting part starts and
 * ends, so editors can splice text into the buffer.
 *
 * Object ids are matched loosely: Xcode writes 24 hex characters, ids created
 * by this tool are shorter ("AA" + 6 hex).
 */
import { ManifestSection } from '../types/index.js';

/**
 * Object id pattern
 */
export const OBJECT_ID = '[0-9A-Za-z]+';

/**
 * Product types in priority order (highest first)
 */
export enum ProductType {
  Application = 'com.apple.product-type.application',
  ApplicationOnDemandInstall = 'com.apple.product-type.application.on-demand-install-capable',
  AppExtension = 'com.apple.product-type.app-extension',
  ExtensionKitExtension = 'com.apple.product-type.extensionkit-extension',
  WatchApp = 'com.apple.product-type.application.watchapp2',
  WatchExtension = 'com.apple.product-type.watchkit2-extension',
  TVExtension = 'com.apple.product-type.tv-app-extension',
  UnitTest = 'com.apple.product-type.bundle.unit-test',
  UITest = 'com.apple.product-type.bundle.ui-testing',
  Framework = 'com.apple.product-type.framework',
  StaticFramework = 'com.apple.product-type.framework.static',
  StaticLibrary = 'com.apple.product-type.library.static',
  DynamicLibrary = 'com.apple.product-type.library.dynamic',
  Bundle = 'com.apple.product-type.bundle',
  XPCService = 'com.apple.product-type.xpc-service',
}

/**
 * Product type priority for target selection
 * Higher number = higher priority = prefer this target
 */
const PRODUCT_TYPE_PRIORITY: Record<string, number> = {
  [ProductType.Application]: 100,
  [ProductType.ApplicationOnDemandInstall]: 95, // App Clip
  [ProductType.WatchApp]: 50,
  [ProductType.AppExtension]: 30,
  [ProductType.ExtensionKitExtension]: 30,
  [ProductType.WatchExtension]: 25,
  [ProductType.TVExtension]: 25,
  [ProductType.Framework]: 20,
  [ProductType.StaticFramework]: 20,
  [ProductType.StaticLibrary]: 15,
  [ProductType.DynamicLibrary]: 15,
  [ProductType.Bundle]: 10,
  [ProductType.XPCService]: 10,
  [ProductType.UnitTest]: 5,
  [ProductType.UITest]: 5,
};

/**
 * An id together with the comment Xcode writes after it
 */
export interface PbxprojObjectRef {
  id: string;
  comment: string;
}

/**
 * A native target parsed from pbxproj
 */
export interface PbxprojTarget {
  /** The unique ID in the pbxproj */
  id: string;
  /** Target name (e.g., "MyApp") */
  name: string;
  /** Product type (e.g., "com.apple.product-type.application") */
  productType: string;
  /** Build phases in the order the target lists them */
  buildPhases: PbxprojObjectRef[];
  /** Product name if specified */
  productName?: string;
}

/**
 * Location of the body between a section's Begin and End markers
 */
export interface SectionRange {
  start: number;
  end: number;
  body: string;
}

/**
 * Location of a parenthesized id list (group children, phase files)
 */
export interface ListBlock {
  /** Id of the object owning the list */
  id: string;
  /** Offset of the first character inside the parentheses */
  start: number;
  /** Offset of the closing parenthesis */
  end: number;
  /** Raw text between the parentheses */
  items: string;
}

/**
 * Escape a string for literal use inside a RegExp
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Render a string the way pbxproj expects it: bare when it only holds
 * [A-Za-z0-9_$./], quoted otherwise.
 */
export function quotePbxString(value: string): string {
  if (/^[A-Za-z0-9_$./]+$/.test(value)) {
    return value;
  }
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Parse all PBXNativeTarget entries from pbxproj content
 *
 * @param content The raw pbxproj file content
 * @returns Array of parsed targets
 */
export function parsePbxprojTargets(content: string): PbxprojTarget[] {
  const targets: PbxprojTarget[] = [];

  // Format: ID /* Name */ = { isa = PBXNativeTarget; ... };
  const targetRegex = new RegExp(
    `(${OBJECT_ID})\\s*\\/\\*\\s*([^*]+?)\\s*\\*\\/\\s*=\\s*\\{([^}]*isa\\s*=\\s*PBXNativeTarget[^}]*(?:\\{[^}]*\\}[^}]*)*)\\};`,
    'g'
  );

  let match;
  while ((match = targetRegex.exec(content)) !== null) {
    const id = match[1];
    const name = match[2].trim();
    const block = match[3];

    const productTypeMatch = block.match(/productType\s*=\s*"([^"]+)"/);
    const productType = productTypeMatch ? productTypeMatch[1] : '';

    const productNameMatch = block.match(/productName\s*=\s*"?([^";]+)"?\s*;/);
    const productName = productNameMatch ? productNameMatch[1].trim() : undefined;

    const phasesMatch = block.match(/buildPhases\s*=\s*\(([^)]*)\)/);
    const buildPhases = phasesMatch ? parseObjectRefs(phasesMatch[1]) : [];

    if (productType) {
      targets.push({
        id,
        name,
        productType,
        buildPhases,
        productName,
      });
    }
  }

  return targets;
}

/**
 * Parse "ID /* comment *\/," items of an id list
 */
export function parseObjectRefs(items: string): PbxprojObjectRef[] {
  const refs: PbxprojObjectRef[] = [];
  const refRegex = new RegExp(`(${OBJECT_ID})\\s*(?:\\/\\*\\s*([^*]*?)\\s*\\*\\/)?\\s*,`, 'g');

  let match;
  while ((match = refRegex.exec(items)) !== null) {
    refs.push({ id: match[1], comment: match[2] ?? '' });
  }

  return refs;
}

/**
 * Get the priority score for a product type
 * Higher = better candidate for main app
 */
export function getProductTypePriority(productType: string): number {
  return PRODUCT_TYPE_PRIORITY[productType] ?? 0;
}

/**
 * Get the main app target from a list of targets
 *
 * Selection criteria:
 * 1. Product type priority (application > extension > test)
 * 2. Name matching project name (tie-breaker)
 * 3. Shorter name (final fallback)
 *
 * @param projectName Optional project name for name-matching tie-breaker
 * @returns The best target, or undefined if no targets
 */
export function getMainAppTarget(
  targets: PbxprojTarget[],
  projectName?: string
): PbxprojTarget | undefined {
  if (targets.length === 0) {
    return undefined;
  }

  const sorted = [...targets].sort((a, b) => {
    const priorityA = getProductTypePriority(a.productType);
    const priorityB = getProductTypePriority(b.productType);

    if (priorityA !== priorityB) {
      return priorityB - priorityA;
    }

    if (projectName) {
      const normalizedProject = projectName.toLowerCase().replace(/[^a-z0-9]/g, '');
      const normalizedA = a.name.toLowerCase().replace(/[^a-z0-9]/g, '');
      const normalizedB = b.name.toLowerCase().replace(/[^a-z0-9]/g, '');

      const matchA = normalizedA.includes(normalizedProject) || normalizedProject.includes(normalizedA);
      const matchB = normalizedB.includes(normalizedProject) || normalizedProject.includes(normalizedB);

      if (matchA && !matchB) return -1;
      if (matchB && !matchA) return 1;
    }

    // Prefer shorter names (less likely to be "MyAppTests", "MyAppUITests")
    return a.name.length - b.name.length;
  });

  return sorted[0];
}

/**
 * Locate the body of "/* Begin <section> section *\/" ... "/* End <section> section *\/".
 * The body starts after the Begin line and ends right before the End marker.
 */
export function findSection(content: string, section: ManifestSection): SectionRange | undefined {
  const beginLine = `/* Begin ${section} section */\n`;
  const pattern = new RegExp(
    `${escapeRegExp(beginLine)}([\\s\\S]*?)${escapeRegExp(`/* End ${section} section */`)}`
  );
  const match = pattern.exec(content);
  if (!match) {
    return undefined;
  }

  const start = match.index + beginLine.length;
  return { start, end: start + match[1].length, body: match[1] };
}

/**
 * Find the children list of the PBXGroup whose name comment is `name`
 */
export function findGroup(content: string, name: string): ListBlock | undefined {
  const pattern = new RegExp(
    `\\b(${OBJECT_ID})\\s*\\/\\*\\s*${escapeRegExp(name)}\\s*\\*\\/\\s*=\\s*\\{[^}]*?isa\\s*=\\s*PBXGroup;[^}]*?children\\s*=\\s*\\(([\\s\\S]*?)\\);`
  );
  return toListBlock(pattern.exec(content));
}

/**
 * Pattern for a PBXSourcesBuildPhase block whose id matches `id`
 */
function sourcesBuildPhasePattern(id: string, flags?: string): RegExp {
  return new RegExp(
    `\\b(${id})\\s*\\/\\*\\s*Sources\\s*\\*\\/\\s*=\\s*\\{[^}]*?isa\\s*=\\s*PBXSourcesBuildPhase;[^}]*?files\\s*=\\s*\\(([\\s\\S]*?)\\);`,
    flags
  );
}

/**
 * Find the files list of a PBXSourcesBuildPhase.
 *
 * @param phaseId Restrict the search to this object id; otherwise the first
 *   Sources phase in the file is returned
 */
export function findSourcesBuildPhase(content: string, phaseId?: string): ListBlock | undefined {
  const id = phaseId ? escapeRegExp(phaseId) : OBJECT_ID;
  return toListBlock(sourcesBuildPhasePattern(id).exec(content));
}

/**
 * Files lists of every PBXSourcesBuildPhase, in file order
 */
export function findSourcesBuildPhases(content: string): ListBlock[] {
  const pattern = sourcesBuildPhasePattern(OBJECT_ID, 'g');
  const phases: ListBlock[] = [];

  let match;
  while ((match = pattern.exec(content)) !== null) {
    const block = toListBlock(match);
    if (block) {
      phases.push(block);
    }
  }
  return phases;
}

/**
 * Ids of every PBXFileReference whose path is `filename`
 */
export function findFileReferenceIds(content: string, filename: string): string[] {
  const pattern = new RegExp(
    `^\\s*(${OBJECT_ID})\\s*\\/\\*[^\\n]*?\\*\\/\\s*=\\s*\\{isa\\s*=\\s*PBXFileReference;[^\\n]*?\\bpath\\s*=\\s*${escapeRegExp(quotePbxString(filename))};`,
    'gm'
  );

  const ids: string[] = [];
  let match;
  while ((match = pattern.exec(content)) !== null) {
    ids.push(match[1]);
  }
  return ids;
}

/**
 * Ids of every PBXBuildFile pointing at `fileRefId`, in file order.
 * A file compiled into several targets has one build file per target.
 */
export function findBuildFileIds(content: string, fileRefId: string): string[] {
  const pattern = new RegExp(
    `^\\s*(${OBJECT_ID})\\s*\\/\\*[^\\n]*?\\*\\/\\s*=\\s*\\{isa\\s*=\\s*PBXBuildFile;[^\\n]*?\\bfileRef\\s*=\\s*${escapeRegExp(fileRefId)}\\b`,
    'gm'
  );

  const ids: string[] = [];
  let match;
  while ((match = pattern.exec(content)) !== null) {
    ids.push(match[1]);
  }
  return ids;
}

/**
 * Id of the first PBXBuildFile pointing at `fileRefId`, if any
 */
export function findBuildFileId(content: string, fileRefId: string): string | undefined {
  return findBuildFileIds(content, fileRefId)[0];
}

/**
 * Turn a match whose last group is the list body (followed by ");") into a ListBlock
 */
function toListBlock(match: RegExpExecArray | null): ListBlock | undefined {
  if (!match) {
    return undefined;
  }

  const items = match[2];
  const end = match.index + match[0].length - ');'.length;
  return { id: match[1], start: end - items.length, end, items };
}
