import { Command, CommanderError } from 'commander';
import { AppError, ConfigError, UsageError } from '@mender/shared';
import { registerRunCommand } from './commands/run';
import { registerDoctorCommand } from './commands/doctor';

export const name = '@mender/cli';
export const version = '0.1.0';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mender')
    .description('Audit, fix and test a source tree until it converges')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerRunCommand(program);
  registerDoctorCommand(program);

  return program;
}

/** Exit code for an error that escaped a command. */
export function exitCodeForError(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? 0 : 2;
  }
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}

export function reportError(error: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    const payload =
      error instanceof AppError
        ? { code: error.code, message: error.message, details: error.details }
        : { code: 'UnknownError', message: error instanceof Error ? error.message : String(error) };
    console.log(JSON.stringify({ error: payload }));
    return;
  }

  console.error(`❌ Error: ${(error instanceof Error && error.message) || String(error)}`);
  if (error instanceof AppError && error.details) {
    console.error(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  if (opts.verbose && error instanceof Error && error.stack) {
    console.error(`\nStack Trace:\n${error.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

export async function main(argv: string[]): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
  } catch (e) {
    // Commander has already printed its own usage errors.
    if (!(e instanceof CommanderError)) {
      reportError(e, program.opts());
    }
    process.exitCode = exitCodeForError(e);
  }
}
