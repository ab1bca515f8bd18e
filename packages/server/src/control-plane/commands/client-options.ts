import { Command } from 'commander';
import { WarmboxClient } from '@warmbox/client';

export interface ClientOptions {
  url?: string;
  token?: string;
  json?: boolean;
}

/**
 * Add the connection flags shared by every command that talks to a
 * running server.
 */
export function withClientOptions(command: Command): Command {
  return command
    .option('--url <url>', 'Server URL (default: WARMBOX_URL or http://127.0.0.1:8000)')
    .option('--token <token>', 'Bearer token (default: WARMBOX_BEARER_TOKEN)')
    .option('--json', 'Output result as JSON', false);
}

export function createClient(options: ClientOptions): WarmboxClient {
  const token = options.token ?? process.env['WARMBOX_BEARER_TOKEN'];
  return new WarmboxClient({
    baseUrl: options.url ?? process.env['WARMBOX_URL'] ?? 'http://127.0.0.1:8000',
    ...(token && { bearerToken: token }),
  });
}
