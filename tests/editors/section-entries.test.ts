/**
 * Tests for the PBXBuildFile and PBXFileReference section editors
 */
import { addBuildFiles, renderBuildFile } from '../../src/editors/build-file-section';
import { addFileReferences, renderFileReference } from '../../src/editors/file-reference-section';
import { EditStatus, ManifestSection } from '../../src/types';
import { loadFixture, makeEntry } from '../helpers';

const EMPTY_BUILD_FILES = '/* Begin PBXBuildFile section */\n/* End PBXBuildFile section */\n';

describe('PBXBuildFile section editor', () => {
  const fixture = loadFixture();

  it('should render a build file line linking build id and reference id', () => {
    expect(renderBuildFile(makeEntry())).toBe(
      '\t\tAA000002 /* Item.swift in Sources */ = {isa = PBXBuildFile; fileRef = AA000001 /* Item.swift */; };'
    );
  });

  it('should append entries at the end of the section', () => {
    const outcome = addBuildFiles(fixture, [makeEntry()]);

    expect(outcome.content).toContain(
      '/* SampleTests.swift */; };\n' +
        '\t\tAA000002 /* Item.swift in Sources */ = {isa = PBXBuildFile; fileRef = AA000001 /* Item.swift */; };\n' +
        '/* End PBXBuildFile section */'
    );
    expect(outcome.edits).toEqual([
      { section: ManifestSection.BuildFile, status: EditStatus.Applied, added: ['AA000002'] },
    ]);
  });

  it('should fill an empty section', () => {
    const outcome = addBuildFiles(EMPTY_BUILD_FILES, [makeEntry()]);

    expect(outcome.content).toBe(
      '/* Begin PBXBuildFile section */\n' +
        '\t\tAA000002 /* Item.swift in Sources */ = {isa = PBXBuildFile; fileRef = AA000001 /* Item.swift */; };\n' +
        '/* End PBXBuildFile section */\n'
    );
  });

  it('should leave existing build files alone', () => {
    const outcome = addBuildFiles(fixture, [makeEntry({ buildFileExists: true })]);

    expect(outcome.content).toBe(fixture);
    expect(outcome.edits[0].status).toBe(EditStatus.Unchanged);
  });

  it('should skip with a message when the markers are missing', () => {
    const content = 'objects = {\n};\n';
    const outcome = addBuildFiles(content, [makeEntry(), makeEntry({ buildFileId: 'AA000004' })]);

    expect(outcome.content).toBe(content);
    expect(outcome.edits).toEqual([
      {
        section: ManifestSection.BuildFile,
        status: EditStatus.Skipped,
        added: [],
        message: 'PBXBuildFile section not found; skipped 2 entries',
      },
    ]);
  });
});

describe('PBXFileReference section editor', () => {
  const fixture = loadFixture();

  it('should render a group-relative reference', () => {
    expect(renderFileReference(makeEntry())).toBe(
      '\t\tAA000001 /* Item.swift */ = {isa = PBXFileReference; lastKnownFileType = sourcecode.swift; path = Item.swift; sourceTree = "<group>"; };'
    );
  });

  it('should quote names that need it and honor the file type', () => {
    const entry = makeEntry({ filename: 'My View.m' });

    expect(renderFileReference(entry, 'sourcecode.c.objc')).toBe(
      '\t\tAA000001 /* My View.m */ = {isa = PBXFileReference; lastKnownFileType = sourcecode.c.objc; path = "My View.m"; sourceTree = "<group>"; };'
    );
  });

  it('should append entries at the end of the section', () => {
    const outcome = addFileReferences(fixture, [makeEntry()]);

    expect(outcome.content).toContain(
      'path = SampleTests.xctest; sourceTree = BUILT_PRODUCTS_DIR; };\n' +
        '\t\tAA000001 /* Item.swift */ = {isa = PBXFileReference; lastKnownFileType = sourcecode.swift; path = Item.swift; sourceTree = "<group>"; };\n' +
        '/* End PBXFileReference section */'
    );
    expect(outcome.edits).toEqual([
      { section: ManifestSection.FileReference, status: EditStatus.Applied, added: ['AA000001'] },
    ]);
  });

  it('should skip references that already exist', () => {
    const outcome = addFileReferences(fixture, [
      makeEntry({ fileRefExists: true }),
      makeEntry({ path: 'Views/Row.swift', filename: 'Row.swift', folder: 'Views', fileRefId: 'AA000003' }),
    ]);

    expect(outcome.edits[0].added).toEqual(['AA000003']);
    expect(outcome.content).not.toContain('AA000001 /* Item.swift */');
  });

  it('should skip with a message when the markers are missing', () => {
    const outcome = addFileReferences(EMPTY_BUILD_FILES, [makeEntry()]);

    expect(outcome.content).toBe(EMPTY_BUILD_FILES);
    expect(outcome.edits[0].message).toBe('PBXFileReference section not found; skipped 1 entry');
  });
});
