import { classifyExecutionStatus, type ExecutionDetails, type StatusKind } from '@valohai-flow/shared';

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
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
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
 * Format an execution status, colored by its classification.
 */
export function formatStatus(status: string): string {
  const kindColors: Record<StatusKind, keyof typeof colors> = {
    incomplete: 'yellow',
    failed: 'red',
    success: 'green',
    unrecognized: 'white',
  };

  return colorize(status.toUpperCase(), kindColors[classifyExecutionStatus(status).kind]);
}

/**
 * Format execution details for display.
 */
export function formatExecutionDetail(details: ExecutionDetails): string {
  const lines = [
    `${bold('Execution:')} ${details.id}`,
    `${bold('Status:')}    ${formatStatus(details.status)}`,
    `${bold('URL:')}       ${cyan(details.urls.display)}`,
  ];

  if (details.outputs.length > 0) {
    lines.push(bold('Outputs:'));
    for (const output of details.outputs) {
      lines.push(`  - ${output.name}`);
    }
  } else {
    lines.push(`${bold('Outputs:')}   ${dim('none')}`);
  }

  return lines.join('\n');
}

/**
 * Format success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format info message.
 */
export function formatInfo(message: string): string {
  return `${cyan('ℹ')} ${message}`;
}

/**
 * Format JSON output.
 */
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
