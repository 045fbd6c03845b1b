/**
 * Command-line interface
 *
 * tree-mirror <source_dir> <replica_dir> [-f seconds] [-l log_dir]
 */

import { Command } from 'commander';
import {
  loadConfigFile,
  resolveConfig,
  type CliOptions,
  type MirrorConfig
} from '../config/mirrorConfig.js';
import { MirrorError, ValidationError } from '../errors/mirrorErrors.js';
import { runMirror, type RunMirrorOptions } from './runMirror.js';

export const VERSION = '1.0.0';

export const EXIT_USAGE = 1;

export type RunFn = (config: MirrorConfig, options: RunMirrorOptions) => Promise<number>;

export interface ProgramOptions {
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Replaced in tests */
  run?: RunFn;
  /** Receives the exit code of the run */
  onExit?: (code: number) => void;
}

/**
 * Build the tree-mirror command
 *
 * Option values are validated by resolveConfig, together with the
 * environment and config file, so every bad value is reported the same way.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const run = options.run ?? runMirror;
  const onExit = options.onExit ?? ((code: number) => { process.exitCode = code; });

  const program = new Command();

  program
    .name('tree-mirror')
    .description('Periodically mirror a source directory into a replica directory (one-way).')
    .version(VERSION, '-V, --version')
    .argument('[source_dir]', 'path to the source directory')
    .argument('[replica_dir]', 'path to the replica directory')
    .option('-f, --frequency <seconds>', 'seconds between synchronization passes (default: 60)')
    .option('-l, --log_dir <dir>', 'directory in which sync_log.txt is written (default: current directory)')
    .option('-c, --compare <mode>', 'how files present on both sides are compared: content or metadata (default: content)')
    .option('-x, --exclude <pattern...>', 'gitignore-style pattern to leave out of the mirror (repeatable)')
    .option('--config <file>', 'JSON file with default settings')
    .option('--once', 'run a single pass and exit')
    .option('--dry-run', 'log what a pass would change without touching the replica')
    .action(async (source: string | undefined, replica: string | undefined, cli: CliOptions) => {
      let config: MirrorConfig;
      try {
        const file = cli.config ? await loadConfigFile(cli.config) : {};
        config = resolveConfig({ source, replica }, cli, options.env ?? process.env, file, options.cwd);
      } catch (error) {
        if (error instanceof ValidationError) {
          program.error(`Error: ${error.message}`, { exitCode: EXIT_USAGE, code: error.code });
        }
        throw error;
      }

      try {
        onExit(await run(config, { signal: options.signal, cwd: options.cwd }));
      } catch (error) {
        if (error instanceof MirrorError) {
          program.error(`Error: ${error.message}`, { exitCode: EXIT_USAGE, code: error.code });
        }
        throw error;
      }
    });

  return program;
}
