/**
 * Manifest loader and writer
 */
import * as fs from 'fs';
import { ManifestReadError, ManifestWriteError } from './errors.js';

/**
 * Read the whole manifest into memory
 */
export function readManifest(projectPath: string): string {
  try {
    return fs.readFileSync(projectPath, 'utf-8');
  } catch (error) {
    throw new ManifestReadError(projectPath, error);
  }
}

/**
 * Overwrite the manifest in place. Not atomic: an interrupted write can leave
 * a truncated file behind.
 */
export function writeManifest(projectPath: string, content: string): void {
  try {
    fs.writeFileSync(projectPath, content, 'utf-8');
  } catch (error) {
    throw new ManifestWriteError(projectPath, error);
  }
}
