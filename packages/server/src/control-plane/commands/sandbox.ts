import { Command } from 'commander';
import { z } from 'zod';
import {
  print,
  printError,
  formatError,
  formatHandle,
  formatInspection,
  formatJson,
  formatSandboxList,
  formatSuccess,
  formatValidationErrors,
} from '../formatter.js';
import { createClient, withClientOptions, type ClientOptions } from './client-options.js';

const acquireOptionsSchema = z.object({
  type: z.string().min(1).optional(),
  timeout: z.coerce.number().int().min(1).optional(),
  env: z.array(z.string().regex(/^[^=]+=/, 'Expected KEY=VALUE')).default([]),
});

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Turn repeated `--env KEY=VALUE` flags into a map.
 */
export function parseEnvPairs(pairs: string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    env[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return env;
}

/**
 * Wrap a command action with the standard error reporting.
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      printError(formatError(error instanceof Error ? error.message : String(error)));
      process.exitCode = 1;
    }
  };
}

/**
 * Create the sandbox command group.
 */
export function createSandboxCommand(): Command {
  const command = new Command('sandbox').description('Acquire and manage sandboxes on a running server');

  command.addCommand(
    withClientOptions(
      new Command('acquire')
        .description('Acquire a sandbox')
        .option('-t, --type <type>', 'Sandbox type (default: the server default)')
        .option('--timeout <seconds>', 'Lease length in seconds')
        .option('-e, --env <KEY=VALUE>', 'Environment override (repeatable); bypasses the warm pool', collect)
    ).action(
      run(async (rawOptions: Record<string, unknown> & ClientOptions) => {
        const optionsResult = acquireOptionsSchema.safeParse(rawOptions);
        if (!optionsResult.success) {
          printError(
            formatValidationErrors(
              optionsResult.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
            )
          );
          process.exitCode = 1;
          return;
        }

        const { type, timeout, env } = optionsResult.data;
        const handle = await createClient(rawOptions).sandboxes.acquire({
          ...(type && { type }),
          ...(timeout !== undefined && { timeoutSeconds: timeout }),
          ...(env.length > 0 && { env: parseEnvPairs(env) }),
        });

        print(rawOptions.json ? formatJson(handle) : formatHandle(handle));
      })
    )
  );

  command.addCommand(
    withClientOptions(new Command('release').description('Release a sandbox').argument('<id>', 'Sandbox ID')).action(
      run(async (id: string, options: ClientOptions) => {
        const result = await createClient(options).sandboxes.release(id);
        print(options.json ? formatJson(result) : formatSuccess(`Released ${result.id}`));
      })
    )
  );

  command.addCommand(
    withClientOptions(new Command('inspect').description('Show a sandbox').argument('<id>', 'Sandbox ID')).action(
      run(async (id: string, options: ClientOptions) => {
        const inspection = await createClient(options).sandboxes.inspect(id);
        print(options.json ? formatJson(inspection) : formatInspection(inspection));
      })
    )
  );

  command.addCommand(
    withClientOptions(new Command('list').alias('ls').description('List sandboxes on the answering worker')).action(
      run(async (options: ClientOptions) => {
        const sandboxes = await createClient(options).sandboxes.list();
        print(options.json ? formatJson(sandboxes) : formatSandboxList(sandboxes));
      })
    )
  );

  command.addCommand(
    withClientOptions(
      new Command('heartbeat').description('Record activity on a sandbox').argument('<id>', 'Sandbox ID')
    ).action(
      run(async (id: string, options: ClientOptions) => {
        const result = await createClient(options).sandboxes.heartbeat(id);
        print(options.json ? formatJson(result) : formatSuccess(`Activity recorded at ${result.lastActivityAt}`));
      })
    )
  );

  return command;
}
