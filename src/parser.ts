import { Command, Option } from 'commander';

import { catalogCommandHandler, syncCommandHandler } from '@/assets/sync.command';
import { downloadCommandHandler } from '@/assets/download.command';
import { exportCommandHandler } from '@/assets/export.command';
import {
  type DownloadCliOptionsInput,
  type ExportCliOptionsInput,
  parsePositiveNumber,
  type SyncCliOptionsInput,
  type VerifyCliOptionsInput,
} from '@/assets/options';
import { verifyCommandHandler } from '@/assets/verify.command';
import { LOG_LEVELS } from '@/logger';

export type Package = {
  name: string;
  version: string;
  description: string;
};

const withCommonOptions = (command: Command): Command =>
  command
    .option('--project-path <path>', 'Unity project root', '.')
    .option('--packages <names...>', 'only process these packages')
    .addOption(
      new Option('--log-level <level>', 'log verbosity (defaults to LOG_LEVEL or info)').choices(
        LOG_LEVELS,
      ),
    )
    .option('--no-ui', 'disable the interactive progress board');

export const parse = ({ argv, pkg }: { argv: string[]; pkg: Package }): (() => Promise<void>) => {
  const program = new Command();

  program
    .name('package-sync')
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'output the current version')
    .showSuggestionAfterError()
    .showHelpAfterError();

  withCommonOptions(
    program
      .command('download')
      .description('Download every package whose pointer file carries a remote link'),
  )
    .option('--verify-only', 'only verify artifacts already in the download cache')
    .option('--max-size <gb>', 'maximum artifact size in GB', parsePositiveNumber, 5)
    .action(async (rawOptions: DownloadCliOptionsInput) => {
      await downloadCommandHandler(rawOptions);
    });

  withCommonOptions(
    program
      .command('sync')
      .description('Upload packages without a remote link and rewrite their pointer files'),
  )
    .option('--no-placeholders', 'fail packages without an export instead of uploading a placeholder')
    .option('--list-only', 'only regenerate the package catalog')
    .option('--vendor <name>', 'vendor directory used for nested package names')
    .action(async (rawOptions: SyncCliOptionsInput) => {
      await syncCommandHandler(rawOptions);
    });

  withCommonOptions(
    program.command('export').description('Export package folders with the Unity editor in batch mode'),
  )
    .option('--editor-path <path>', 'Unity editor executable (defaults to UNITY_PATH or auto-detect)')
    .option('--dry-run', 'list the packages that would be exported')
    .action(async (rawOptions: ExportCliOptionsInput) => {
      await exportCommandHandler(rawOptions);
    });

  withCommonOptions(
    program.command('verify').description('Check downloaded artifacts for truncated files'),
  )
    .option('--purge', 'delete artifacts that look corrupted')
    .action(async (rawOptions: VerifyCliOptionsInput) => {
      await verifyCommandHandler(rawOptions);
    });

  withCommonOptions(
    program.command('catalog').description('Write the package catalog page from pointer files'),
  )
    .option('--vendor <name>', 'vendor directory used for nested package names')
    .action(async (rawOptions: SyncCliOptionsInput) => {
      await catalogCommandHandler(rawOptions);
    });

  return async () => {
    if (argv.length <= 2) {
      program.outputHelp();
      return;
    }

    await program.parseAsync(argv);
  };
};
