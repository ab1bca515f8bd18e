import type {
  InspectState,
  SandboxHandle,
  SandboxInspection,
  SandboxSummary,
  SandboxTypeSummary,
} from '@warmbox/shared';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a sandbox state with its color.
 */
export function formatState(state: InspectState): string {
  const stateColors: Record<InspectState, keyof typeof colors> = {
    warm: 'yellow',
    assigned: 'green',
    destroyed: 'gray',
    unknown: 'red',
  };
  return colorize(state.toUpperCase(), stateColors[state]);
}

/**
 * Format a millisecond age as "42s", "3m 5s" or "2h 10m".
 */
export function formatAge(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}m ${seconds % 60}s`;
  }
  const hours = Math.floor(minutes / 60);
  return `${hours}h ${minutes % 60}m`;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const pad = (text: string, col: TableColumn<T>): string =>
    col.align === 'right' ? text.padStart(col.width) : text.padEnd(col.width);

  const lines = [
    columns.map((col) => bold(pad(col.header, col))).join('  '),
    dim(columns.map((col) => '-'.repeat(col.width)).join('  ')),
  ];

  for (const item of items) {
    lines.push(columns.map((col) => pad(truncate(col.value(item), col.width), col)).join('  '));
  }

  return lines.join('\n');
}

export function formatSandboxList(sandboxes: SandboxSummary[]): string {
  if (sandboxes.length === 0) {
    return dim('No sandboxes.');
  }
  return formatTable(sandboxes, [
    { header: 'ID', width: 40, value: (s) => s.id },
    { header: 'TYPE', width: 12, value: (s) => s.type },
    // Raw state keeps the column width stable under colors
    { header: 'STATE', width: 10, value: (s) => s.state },
    { header: 'PORT', width: 6, align: 'right', value: (s) => String(s.port) },
    { header: 'EXPIRES', width: 24, value: (s) => s.expiresAt ?? '-' },
  ]);
}

export function formatTypeList(types: SandboxTypeSummary[]): string {
  if (types.length === 0) {
    return dim('No sandbox types registered.');
  }
  return formatTable(types, [
    { header: 'TYPE', width: 14, value: (t) => t.type },
    { header: 'SECURITY', width: 8, value: (t) => t.securityLevel },
    { header: 'TIMEOUT', width: 8, align: 'right', value: (t) => `${t.timeoutSeconds}s` },
    { header: 'IMAGE', width: 50, value: (t) => t.image },
  ]);
}

export function formatHandle(handle: SandboxHandle): string {
  return [
    `${bold('ID:')}       ${handle.id}`,
    `${bold('Type:')}     ${handle.type}`,
    `${bold('URL:')}      ${cyan(handle.baseUrl)}`,
    `${bold('Token:')}    ${handle.bearerToken}`,
    `${bold('Expires:')}  ${handle.expiresAt}`,
  ].join('\n');
}

export function formatInspection(inspection: SandboxInspection): string {
  return [
    `${bold('ID:')}        ${inspection.id}`,
    `${bold('Type:')}      ${inspection.type ?? '-'}`,
    `${bold('State:')}     ${formatState(inspection.state)}`,
    `${bold('Port:')}      ${inspection.port ?? '-'}`,
    `${bold('Age:')}       ${inspection.ageMs !== null ? formatAge(inspection.ageMs) : '-'}`,
    `${bold('Activity:')}  ${inspection.lastActivityAt ?? '-'}`,
    `${bold('Expires:')}   ${inspection.expiresAt ?? '-'}`,
    `${bold('Owner:')}     ${inspection.local ? 'this worker' : 'peer worker'}`,
  ].join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  const lines = errors.map((e) => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
