/**
 * CLI Tests
 *
 * Command wiring, option resolution and output formatting.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createProgram, runCli } from '../src/control-plane/cli.js';
import { parseEnvPairs } from '../src/control-plane/commands/sandbox.js';
import { resolveListenSettings } from '../src/control-plane/commands/serve.js';
import {
  formatAge,
  formatError,
  formatSandboxList,
  formatState,
  formatValidationErrors,
  truncate,
} from '../src/control-plane/formatter.js';
import { createTestConfig } from './sandbox/test-utils.js';

describe('createProgram', () => {
  it('should register the top-level commands', () => {
    const program = createProgram();

    expect(program.name()).toBe('warmbox');
    expect(program.commands.map((command) => command.name())).toEqual(['serve', 'sandbox', 'types']);
  });

  it('should register the sandbox subcommands', () => {
    const sandbox = createProgram().commands.find((command) => command.name() === 'sandbox');

    expect(sandbox?.commands.map((command) => command.name())).toEqual([
      'acquire',
      'release',
      'inspect',
      'list',
      'heartbeat',
    ]);
  });
});

describe('runCli', () => {
  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockReturnValue(true);
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('should set a failing exit code for an unknown command', async () => {
    await runCli(['node', 'warmbox', 'nope']);

    expect(process.exitCode).toBe(1);
  });

  it('should leave the exit code alone after printing the version', async () => {
    await runCli(['node', 'warmbox', '--version']);

    expect(process.exitCode).toBeUndefined();
  });
});

describe('parseEnvPairs', () => {
  it('should split on the first equals sign', () => {
    expect(parseEnvPairs(['API_KEY=test-secret', 'QUERY=a=b', 'EMPTY='])).toEqual({
      API_KEY: 'test-secret',
      QUERY: 'a=b',
      EMPTY: '',
    });
  });
});

describe('resolveListenSettings', () => {
  it('should prefer flags over configuration', () => {
    const config = createTestConfig({ host: '0.0.0.0', port: 9000 });

    expect(resolveListenSettings({ port: 8100, corsOrigin: 'a.example, b.example', requestLog: false }, config)).toEqual({
      host: '0.0.0.0',
      port: 8100,
      workers: 1,
      corsOrigins: ['a.example', 'b.example'],
    });
  });

  it('should fall back to one worker without shared state', () => {
    const config = createTestConfig();

    expect(resolveListenSettings({ workers: 4, requestLog: false }, config).workers).toBe(1);
  });

  it('should keep several workers with shared state', () => {
    const config = createTestConfig({ sharedState: { enabled: true } });

    expect(resolveListenSettings({ workers: 4, requestLog: false }, config).workers).toBe(4);
  });
});

describe('formatter', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should format ages', () => {
    expect(formatAge(42_000)).toBe('42s');
    expect(formatAge(185_000)).toBe('3m 5s');
    expect(formatAge(7_800_000)).toBe('2h 10m');
  });

  it('should truncate long text', () => {
    expect(truncate('abcdefghij', 6)).toBe('abc...');
    expect(truncate('abc', 6)).toBe('abc');
  });

  it('should format states and errors without colors', () => {
    expect(formatState('assigned')).toBe('ASSIGNED');
    expect(formatError('boom')).toBe('✗ boom');
  });

  it('should format an empty sandbox list', () => {
    expect(formatSandboxList([])).toBe('No sandboxes.');
  });

  it('should format validation errors', () => {
    expect(formatValidationErrors([{ path: 'timeout', message: 'Expected number' }])).toBe(
      '✗ Validation failed:\n  • timeout: Expected number'
    );
  });
});
