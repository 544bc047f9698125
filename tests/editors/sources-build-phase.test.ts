/**
 * Tests for the PBXSourcesBuildPhase editor
 */
import { addBuildPhaseMemberships } from '../../src/editors/sources-build-phase';
import { findSourcesBuildPhase, parsePbxprojTargets } from '../../src/parsers/pbxproj-parser';
import { EditStatus, ManifestSection } from '../../src/types';
import { loadFixture, makeEntry } from '../helpers';

describe('PBXSourcesBuildPhase editor', () => {
  const fixture = loadFixture();
  const [appTarget, testTarget] = parsePbxprojTargets(fixture);

  it('should append build files to the target Sources phase', () => {
    const outcome = addBuildPhaseMemberships(fixture, [makeEntry()], appTarget);

    expect(findSourcesBuildPhase(outcome.content, '1E0000000000000000000001')?.items).toBe(
      '\n\t\t\t\t1A0000000000000000000001 /* SampleApp.swift in Sources */,' +
        '\n\t\t\t\t1A0000000000000000000002 /* ContentView.swift in Sources */,' +
        '\n\t\t\t\tAA000002 /* Item.swift in Sources */,' +
        '\n\t\t\t'
    );
    expect(outcome.edits).toEqual([
      { section: ManifestSection.SourcesBuildPhase, status: EditStatus.Applied, added: ['AA000002'] },
    ]);
  });

  it('should use the Sources phase of the given target', () => {
    const outcome = addBuildPhaseMemberships(fixture, [makeEntry()], testTarget);

    expect(findSourcesBuildPhase(outcome.content, '1E0000000000000000000004')?.items).toContain(
      'AA000002 /* Item.swift in Sources */,'
    );
    expect(findSourcesBuildPhase(outcome.content, '1E0000000000000000000001')?.items).not.toContain('AA000002');
  });

  it('should fall back to the first Sources phase without a target', () => {
    const outcome = addBuildPhaseMemberships(fixture, [makeEntry()]);

    expect(findSourcesBuildPhase(outcome.content, '1E0000000000000000000001')?.items).toContain(
      'AA000002 /* Item.swift in Sources */,'
    );
  });

  it('should not add a build file twice', () => {
    const first = addBuildPhaseMemberships(fixture, [makeEntry()], appTarget);
    const second = addBuildPhaseMemberships(first.content, [makeEntry()], appTarget);

    expect(second.content).toBe(first.content);
    expect(second.edits[0].status).toBe(EditStatus.Unchanged);
  });

  it('should skip with a message when the target has no Sources phase', () => {
    const target = { ...appTarget, name: 'Broken', buildPhases: [{ id: '1E0000000000000000000002', comment: 'Frameworks' }] };
    const outcome = addBuildPhaseMemberships(fixture, [makeEntry()], target);

    expect(outcome.content).toBe(fixture);
    expect(outcome.edits[0]).toEqual({
      section: ManifestSection.SourcesBuildPhase,
      status: EditStatus.Skipped,
      added: [],
      message: 'Sources build phase of target "Broken" not found; skipped 1 entry',
    });
  });
});
