/**
 * Text formatter for human-readable output
 */
import chalk from 'chalk';
import type { FileStatus, InspectResult, RegisterResult, SectionEdit } from '../types/index.js';
import { EditStatus } from '../types/index.js';

/**
 * Get status color
 */
function getStatusColor(status: EditStatus): (text: string) => string {
  switch (status) {
    case EditStatus.Applied:
      return (text) => chalk.green(text);
    case EditStatus.Unchanged:
      return (text) => chalk.gray(text);
    case EditStatus.Skipped:
      return (text) => chalk.yellow(text);
  }
}

/**
 * One line per section edit, e.g. `PBXGroup "Views": created (+2)`
 */
function formatEdit(edit: SectionEdit): string {
  const label = edit.group ? `${edit.section} "${edit.group}"` : edit.section;
  const status = edit.created ? 'created' : edit.status;
  const added = edit.added.length > 0 ? ` (+${edit.added.length})` : '';
  return `   ${label}: ${getStatusColor(edit.status)(status)}${added}`;
}

/**
 * Format a registration result as text
 */
export function formatText(result: RegisterResult): string {
  const lines: string[] = [];
  const count = result.files.length;

  if (result.dryRun) {
    lines.push(chalk.cyan.bold(`🔍 Dry run: ${count} file(s) would be registered in ${result.projectPath}`));
  } else {
    lines.push(chalk.green.bold(`✅ Registered ${count} file(s) in ${result.projectPath}`));
  }
  if (result.target) {
    lines.push(`   Target: ${result.target}`);
  }
  if (result.parentGroup) {
    lines.push(`   Parent group: ${result.parentGroup}`);
  }
  lines.push('');

  lines.push(chalk.bold('📋 Files:'));
  for (const file of result.files) {
    const note = file.fileRefExists ? chalk.dim(' already registered') : '';
    lines.push(`   • ${file.path} (${file.fileRefId})${note}`);
  }
  lines.push('');

  lines.push(chalk.bold('🧩 Sections:'));
  for (const edit of result.edits) {
    lines.push(formatEdit(edit));
  }
  lines.push('');

  if (result.warnings.length > 0) {
    lines.push(chalk.yellow.bold('⚠️  Warnings:'));
    for (const warning of result.warnings) {
      lines.push(chalk.yellow(`   • ${warning}`));
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Missing registration parts of a file
 */
function missingParts(file: FileStatus): string[] {
  const missing: string[] = [];
  if (!file.inGroup) missing.push('file reference');
  if (!file.buildFileId) missing.push('build file');
  if (!file.inBuildPhase) missing.push('build phase');
  return missing;
}

/**
 * Format an inspection result as text
 */
export function formatInspectionText(result: InspectResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`🔍 Registration status in ${result.projectPath}`));
  if (result.target) {
    lines.push(`   Target: ${result.target}`);
  }
  lines.push('');

  let incomplete = 0;
  for (const file of result.files) {
    const missing = missingParts(file);
    if (missing.length === 0) {
      lines.push(chalk.green(`   ✓ ${file.path}`));
    } else {
      incomplete++;
      lines.push(chalk.red(`   ✗ ${file.path} (missing: ${missing.join(', ')})`));
    }
  }
  lines.push('');

  if (result.complete) {
    lines.push(chalk.green.bold(`✅ All ${result.files.length} file(s) registered`));
  } else {
    lines.push(chalk.red.bold(`❌ ${incomplete} of ${result.files.length} file(s) incomplete`));
  }
  lines.push('');

  return lines.join('\n');
}
