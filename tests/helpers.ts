/**
 * Shared test helpers
 */
import * as fs from 'fs';
import * as path from 'path';
import type { FileEntry, IdGenerator } from '../src/types';

export const FIXTURE_PATH = path.join(__dirname, 'fixtures', 'Sample.xcodeproj', 'project.pbxproj');

/**
 * Sample project: app target "Sample" and unit test target "SampleTests",
 * groups Sample (SampleApp.swift, Views), Views (ContentView.swift),
 * SampleTests and Products.
 */
export function loadFixture(): string {
  return fs.readFileSync(FIXTURE_PATH, 'utf-8');
}

/**
 * Deterministic ids: AA000001, AA000002, ...
 */
export function sequentialIds(start: number = 1): IdGenerator {
  let next = start;
  return () => `AA${String(next++).padStart(6, '0')}`;
}

/**
 * Fixture variant where ContentView.swift is compiled only into SampleTests:
 * its build file 1A..02 moves from the Sample phase to the SampleTests phase.
 */
export function moveContentViewToTestPhase(content: string): string {
  return content
    .replace('\t\t\t\t1A0000000000000000000002 /* ContentView.swift in Sources */,\n', '')
    .replace(
      '\t\t\t\t1A0000000000000000000003 /* SampleTests.swift in Sources */,\n',
      '\t\t\t\t1A0000000000000000000003 /* SampleTests.swift in Sources */,\n' +
        '\t\t\t\t1A0000000000000000000002 /* ContentView.swift in Sources */,\n'
    );
}

export function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

/**
 * A new file "Models/Item.swift" with ids AA000001 (reference) and AA000002 (build file)
 */
export function makeEntry(overrides: Partial<FileEntry> = {}): FileEntry {
  return {
    path: 'Models/Item.swift',
    filename: 'Item.swift',
    folder: 'Models',
    fileRefId: 'AA000001',
    buildFileId: 'AA000002',
    fileRefExists: false,
    buildFileExists: false,
    ...overrides,
  };
}
