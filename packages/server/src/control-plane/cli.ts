import { Command, CommanderError } from 'commander';
import { createServeCommand } from './commands/serve.js';
import { createSandboxCommand } from './commands/sandbox.js';
import { createTypesCommand } from './commands/types.js';
import { VERSION } from '../version.js';

// Exits commander reports after printing help or the version
const INFORMATIONAL_EXITS = new Set(['commander.helpDisplayed', 'commander.version', 'commander.help']);

/**
 * Build the `warmbox` program: `serve` runs the manager in this process,
 * `sandbox` and `types` talk to a running one over HTTP.
 */
export function createProgram(): Command {
  return new Command()
    .name('warmbox')
    .description('Pooled, port-allocated container sandboxes for agent tool execution')
    .version(VERSION, '-v, --version', 'Output the current version')
    .showHelpAfterError()
    .exitOverride()
    .addCommand(createServeCommand())
    .addCommand(createSandboxCommand())
    .addCommand(createTypesCommand());
}

/**
 * Run the CLI. Usage errors set `process.exitCode` instead of throwing;
 * anything else propagates to the entry point.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(args);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (!INFORMATIONAL_EXITS.has(error.code)) {
        process.exitCode = error.exitCode;
      }
      return;
    }
    throw error;
  }
}
