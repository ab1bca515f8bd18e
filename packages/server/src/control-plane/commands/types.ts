import { Command } from 'commander';
import { print, printError, formatError, formatJson, formatTypeList } from '../formatter.js';
import { createClient, withClientOptions, type ClientOptions } from './client-options.js';

/**
 * Create the types command.
 */
export function createTypesCommand(): Command {
  return withClientOptions(new Command('types').description('List sandbox types registered on a running server')).action(
    async (options: ClientOptions) => {
      try {
        const types = await createClient(options).sandboxTypes.list();
        print(options.json ? formatJson(types) : formatTypeList(types));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    }
  );
}
