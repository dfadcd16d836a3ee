/**
 * @rhodl-sync/cli
 *
 * rhodl-sync command: argument parsing, error output and exit codes.
 */

import { Command, CommanderError } from 'commander';
import { registerSyncCommand, defaultSyncDeps, type SyncCommandDeps } from './commands/sync.js';
import { handleCliError } from './core/error-handler.js';

export { syncSchema, type SyncCommandOptions } from './command-defs/sync.js';
export { registerSyncCommand, syncHandler, defaultSyncDeps, type SyncCommandDeps } from './commands/sync.js';
export { formatError, sanitizeErrorMessage, handleCliError, secretsFromEnv } from './core/error-handler.js';

export interface CliIO {
  writeErr: (text: string) => void;
}

const defaultIO: CliIO = {
  writeErr: (text) => {
    process.stderr.write(text);
  },
};

export function createProgram(deps: SyncCommandDeps = defaultSyncDeps, io: CliIO = defaultIO): Command {
  const program = new Command();
  program
    .name('rhodl-sync')
    .description('Sync the Bitcoin RHODL Ratio from CoinGlass into a Google Sheet')
    .version('1.0.0')
    .exitOverride()
    .configureOutput({ writeErr: io.writeErr });
  return registerSyncCommand(program, deps);
}

/**
 * Parse arguments (without node and script), run, and return the exit code
 */
export async function runCli(
  argv: string[],
  deps: SyncCommandDeps = defaultSyncDeps,
  io: CliIO = defaultIO
): Promise<number> {
  const program = createProgram(deps, io);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    // Commander has already printed usage errors, help and version
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const { message } = handleCliError(error, { argv });
    io.writeErr(`Error: ${message}\n`);
    return 1;
  }
}
