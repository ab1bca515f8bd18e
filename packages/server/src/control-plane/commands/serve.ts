import cluster from 'node:cluster';
import { Command } from 'commander';
import { z } from 'zod';
import { getConfig, type WarmboxConfig } from '../../config/index.js';
import { createSandboxManager } from '../../sandbox/manager.js';
import { startServer } from '../../server/index.js';
import { createLogger } from '../../utils/logger.js';
import {
  print,
  printError,
  formatError,
  formatValidationErrors,
  bold,
  cyan,
  yellow,
} from '../formatter.js';

const log = createLogger('serve-command');

/**
 * Schema for serve command options. Unset flags fall back to configuration.
 */
const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
  workers: z.coerce.number().int().min(1).max(64).optional(),
  corsOrigin: z.string().optional(),
  requestLog: z.boolean().default(false),
});

type ServeOptions = z.infer<typeof serveOptionsSchema>;

interface ListenSettings {
  host: string;
  port: number;
  workers: number;
  corsOrigins: string[];
}

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Start the sandbox manager and its HTTP API')
    .option('-p, --port <port>', 'Port to listen on (default: WARMBOX_PORT or 8000)')
    .option('-H, --host <host>', 'Host to bind to (default: WARMBOX_HOST or 127.0.0.1)')
    .option('-w, --workers <n>', 'Worker processes; more than one needs shared state')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .option('--request-log', 'Log every HTTP request', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Resolve listen settings from flags over configuration.
 */
export function resolveListenSettings(options: ServeOptions, config: WarmboxConfig): ListenSettings {
  let workers = options.workers ?? config.workers;
  if (workers > 1 && !config.sharedState.enabled) {
    workers = 1;
  }

  return {
    host: options.host ?? config.host,
    port: options.port ?? config.port,
    workers,
    corsOrigins: options.corsOrigin ? options.corsOrigin.split(',').map((o) => o.trim()) : ['*'],
  };
}

/**
 * Execute the serve command.
 */
async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const config = getConfig();
  const settings = resolveListenSettings(options, config);

  if ((options.workers ?? 1) > 1 && settings.workers === 1) {
    print(yellow('Shared state is disabled; running a single worker'));
  }

  if (settings.workers > 1 && cluster.isPrimary) {
    runPrimary(settings);
    return;
  }

  await runWorker(config, settings, options.requestLog);
}

/**
 * Fork the worker processes and replace any that die unexpectedly.
 */
function runPrimary(settings: ListenSettings): void {
  let stopping = false;

  print(`Starting warmbox with ${bold(String(settings.workers))} workers...`);
  for (let i = 0; i < settings.workers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    if (stopping) {
      return;
    }
    log.warn({ pid: worker.process.pid, code, signal }, 'Worker exited, forking a replacement');
    cluster.fork();
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    stopping = true;
    print('');
    print('Stopping workers...');
    for (const worker of Object.values(cluster.workers ?? {})) {
      worker?.process.kill(signal);
    }
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

async function runWorker(config: WarmboxConfig, settings: ListenSettings, requestLog: boolean): Promise<void> {
  const manager = createSandboxManager(config);
  await manager.initialize();

  const server = await startServer({
    manager,
    host: settings.host,
    port: settings.port,
    corsOrigins: settings.corsOrigins,
    enableLogging: requestLog,
    ...(config.bearerToken && { bearerToken: config.bearerToken }),
  });

  const shutdown = (): void => {
    print('');
    print('Shutting down, releasing sandboxes...');

    server
      .stop()
      .then((result) => {
        if (result.abandoned.length > 0) {
          printError(formatError(`Left ${result.abandoned.length} sandbox(es) running: ${result.abandoned.join(', ')}`));
        }
        print('Server stopped');
        process.exit(0);
      })
      .catch((err: unknown) => {
        printError(formatError(err instanceof Error ? err.message : String(err)));
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  if (!cluster.isWorker) {
    print(`Server is running at ${cyan(server.url)}`);
    print('');
    print(`${bold('Backend:')}       ${config.backend}`);
    print(`${bold('Pool size:')}     ${config.poolSize} per type (${config.defaultSandboxTypes.join(', ')})`);
    print(`${bold('Port range:')}    ${config.portRange[0]}-${config.portRange[1]}`);
    print(`${bold('Shared state:')}  ${config.sharedState.enabled ? 'redis' : 'in-process'}`);
    print(`${bold('Auth:')}          ${config.bearerToken ? 'bearer token' : '(none - auth disabled)'}`);
    print('');
    print('Press Ctrl+C to stop the server');
  }
}
