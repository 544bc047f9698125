/**
 * Tests for target selection
 */
import { selectTarget, findTargetSourcesPhase, projectNameFromPath } from '../../src/core/target';
import { ConfigError } from '../../src/core/errors';
import { loadFixture } from '../helpers';

describe('selectTarget', () => {
  const fixture = loadFixture();

  it('should pick the application target by default', () => {
    expect(selectTarget(fixture)?.name).toBe('Sample');
  });

  it('should pick a named target', () => {
    expect(selectTarget(fixture, 'SampleTests')?.id).toBe('1D0000000000000000000002');
  });

  it('should reject an unknown target name', () => {
    expect(() => selectTarget(fixture, 'Widget')).toThrow(ConfigError);
    expect(() => selectTarget(fixture, 'Widget')).toThrow(
      'Unknown target "Widget". Available targets: Sample, SampleTests'
    );
  });

  it('should return undefined when the manifest has no targets', () => {
    expect(selectTarget('')).toBeUndefined();
  });
});

describe('findTargetSourcesPhase', () => {
  const fixture = loadFixture();

  it('should follow the target build phase list', () => {
    const target = selectTarget(fixture, 'SampleTests');
    expect(findTargetSourcesPhase(fixture, target)?.id).toBe('1E0000000000000000000004');
  });
});

describe('projectNameFromPath', () => {
  it('should derive the name from the .xcodeproj folder', () => {
    expect(projectNameFromPath('/work/DockTile.xcodeproj/project.pbxproj')).toBe('DockTile');
  });

  it('should return undefined outside an .xcodeproj folder', () => {
    expect(projectNameFromPath('/work/project.pbxproj')).toBeUndefined();
  });
});
