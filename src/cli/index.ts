#!/usr/bin/env node
/**
 * pbx-register CLI
 *
 * Registers source files in an Xcode project.pbxproj
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { registerFiles } from '../core/register.js';
import { inspectProject } from '../core/inspect.js';
import { loadConfig, resolveSettings } from '../config/index.js';
import type { Settings } from '../config/index.js';
import { format, formatInspection } from '../formatters/index.js';
import { OutputFormat } from '../types/index.js';
import packageJson from '../../package.json';

interface ManifestCliOptions {
  project?: string;
  config?: string;
  target?: string;
  parentGroup?: string;
  format: string;
  verbose: boolean;
}

interface AddCliOptions extends ManifestCliOptions {
  fileType?: string;
  dryRun: boolean;
}

const program = new Command();

program
  .name('pbx-register')
  .description('Register source files in an Xcode project.pbxproj')
  .version(packageJson.version);

program
  .command('add', { isDefault: true })
  .description('Add file references, build files, groups and Sources phase entries')
  .argument('[files...]', 'Paths relative to the source folder, e.g. Views/ItemView.swift')
  .option('-p, --project <path>', 'Path to project.pbxproj')
  .option('-c, --config <path>', 'Path to a pbx-register.json config file')
  .option('-t, --target <name>', 'Target whose Sources phase receives the files')
  .option('-g, --parent-group <name>', 'Group that receives new folder groups')
  .option('--file-type <type>', 'lastKnownFileType of new file references')
  .option('--dry-run', 'Edit in memory without writing the manifest', false)
  .option('-f, --format <format>', 'Output format: text, json', 'text')
  .option('-v, --verbose', 'Print each step', false)
  .action((files: string[], options: AddCliOptions) => {
    run(() => {
      const outputFormat = parseOutputFormat(options.format);
      const settings = loadSettings(files, options);

      const result = registerFiles({
        ...settings,
        dryRun: options.dryRun,
        onProgress: options.verbose ? reportProgress : undefined,
      });

      console.log(format(result, outputFormat));
    });
  });

program
  .command('check')
  .description('Report which files are registered; exits with 1 when any is incomplete')
  .argument('[files...]', 'Paths relative to the source folder')
  .option('-p, --project <path>', 'Path to project.pbxproj')
  .option('-c, --config <path>', 'Path to a pbx-register.json config file')
  .option('-t, --target <name>', 'Target whose Sources phase is checked')
  .option('-g, --parent-group <name>', 'Group holding root-level files')
  .option('-f, --format <format>', 'Output format: text, json', 'text')
  .option('-v, --verbose', 'Print each step', false)
  .action((files: string[], options: ManifestCliOptions) => {
    run(() => {
      const outputFormat = parseOutputFormat(options.format);
      const settings = loadSettings(files, options);

      if (options.verbose) {
        reportProgress(`Reading ${settings.projectPath}`);
      }
      const result = inspectProject(settings.projectPath, settings.files, {
        target: settings.target,
        parentGroup: settings.parentGroup,
      });

      console.log(formatInspection(result, outputFormat));
      if (!result.complete) {
        process.exitCode = 1;
      }
    });
  });

function loadSettings(files: string[], options: ManifestCliOptions & { fileType?: string }): Settings {
  const cwd = process.cwd();
  const config = loadConfig(cwd, options.config);
  return resolveSettings(cwd, config, {
    project: options.project,
    files,
    target: options.target,
    parentGroup: options.parentGroup,
    fileType: options.fileType,
  });
}

function reportProgress(message: string): void {
  // stderr, so JSON output on stdout stays parseable
  console.error(chalk.dim(`📝 ${message}...`));
}

function run(action: () => void): void {
  try {
    action();
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`❌ Error: ${error.message}`));
      if (error.stack) {
        console.error(error.stack);
      }
    } else {
      console.error(chalk.red('❌ An unknown error occurred'));
    }
    process.exit(1);
  }
}

function parseOutputFormat(format: string): OutputFormat {
  switch (format.toLowerCase()) {
    case 'text':
      return OutputFormat.Text;
    case 'json':
      return OutputFormat.JSON;
    default:
      throw new Error(`Unknown output format: ${format}. Use text or json.`);
  }
}

program.parse();
