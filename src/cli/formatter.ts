import type { AddonReport, AddonOutcome } from '../orchestrator/addon-upgrade.js';
import type { BootstrapReport } from '../orchestrator/bootstrap.js';
import type { FastStatus, FullStatus } from '../orchestrator/status.js';
import { DestructiveOperationError, FatalError, ValidationError } from '../types/errors.js';
import type { MembershipState, NodeSpec } from '../types/node.js';

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

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
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

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

const stateColors: Record<MembershipState, keyof typeof colors> = {
  planned: 'gray',
  provisioned: 'blue',
  joined: 'yellow',
  ready: 'green',
  removed: 'red',
};

const outcomeColors: Record<AddonOutcome, keyof typeof colors> = {
  'already-current': 'gray',
  installed: 'green',
  upgraded: 'green',
  failed: 'red',
};

/**
 * Format a roster membership state with appropriate color.
 */
export function formatMembershipState(state: MembershipState): string {
  return colorize(state, stateColors[state]);
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

/**
 * Table column definition.
 */
interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table. Values are truncated and padded before they are
 * colored so that escape codes do not skew the column widths.
 */
export function formatTable<T>(
  items: readonly T[],
  columns: TableColumn<T>[],
  style?: (item: T, column: TableColumn<T>, cell: string) => string
): string {
  const lines: string[] = [];

  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        const cell = col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
        return style ? style(item, col, cell) : cell;
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

export function formatRoster(nodes: readonly NodeSpec[]): string {
  if (nodes.length === 0) {
    return dim('No additional nodes in the roster.');
  }
  return formatTable(
    nodes,
    [
      { header: 'NAME', width: 20, value: n => n.name },
      { header: 'ROLE', width: 14, value: n => n.role },
      { header: 'STATE', width: 12, value: n => n.state },
    ],
    (node, column, cell) => (column.header === 'STATE' ? colorize(cell, stateColors[node.state]) : cell)
  );
}

export function formatAddonReports(reports: readonly AddonReport[]): string {
  return formatTable(
    reports,
    [
      { header: 'ADDON', width: 30, value: r => r.addon },
      { header: 'BEFORE', width: 12, value: r => r.beforeVersion ?? '-' },
      { header: 'AFTER', width: 12, value: r => r.afterVersion ?? '-' },
      { header: 'TARGET', width: 12, value: r => r.targetVersion },
      { header: 'RESULT', width: 16, value: r => r.outcome },
    ],
    (report, column, cell) =>
      column.header === 'RESULT' ? colorize(cell, outcomeColors[report.outcome]) : cell
  );
}

export function formatFastStatus(status: FastStatus): string {
  const k8s = status.k8sNodes === null ? red('unreachable') : String(status.k8sNodes);
  return [
    `${bold('Workspace:')}        ${status.workspace}`,
    `${bold('VMs deployed:')}     ${status.vmsDeployed}`,
    `${bold('Nodes reachable:')}  ${status.nodesReachable}/${status.vmsDeployed}`,
    `${bold('Kubernetes nodes:')} ${k8s}`,
    dim(`cache: infra ${status.cache.infra}, ssh ${status.cache.ssh}`),
  ].join('\n');
}

export function formatFullStatus(status: FullStatus): string {
  const lines: string[] = [];
  lines.push(`${bold('Workspace:')} ${status.workspace}`);
  lines.push('');

  lines.push(bold('Roster:'));
  lines.push(formatRoster(status.roster));
  lines.push('');

  lines.push(bold('VMs:'));
  if (status.hosts.length === 0) {
    lines.push(dim('No VMs deployed.'));
  }
  for (const host of status.hosts) {
    const reach = host.reachable ? green('reachable') : red('unreachable');
    lines.push(`  ${padRight(host.name, 20)} ${padRight(host.address, 16)} ${reach}`);
  }
  lines.push('');

  lines.push(bold('Checks:'));
  for (const check of status.checks) {
    const mark = check.ok ? green('✓') : red('✗');
    lines.push(`  ${mark} ${padRight(check.name, 22)} ${check.detail}`);
  }
  return lines.join('\n');
}

export function formatBootstrapReport(report: BootstrapReport): string {
  const lines: string[] = [];
  lines.push(`${bold('Workspace:')} ${report.workspace}`);
  lines.push(`${bold('State:')}     ${report.state}`);
  if (report.networking) {
    lines.push(`${bold('Networking:')} ${report.networking}`);
  }
  for (const join of report.joins) {
    lines.push(`  ${padRight(join.name, 20)} ${join.outcome}${join.ready ? '' : dim(' (not ready yet)')}`);
  }
  if (report.approvedCsrs.length > 0) {
    lines.push(`${bold('Approved CSRs:')} ${report.approvedCsrs.length}`);
  }
  lines.push(dim(`run ${report.runId}`));
  return lines.join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

export function formatSuggestion(command: string): string {
  return `  ${dim('→')} ${cyan(command)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * One-line cause, then the suggested next command and, for a failed
 * destructive operation, what was done and what remains.
 */
export function formatFailure(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const lines = [formatError(message)];

  if (error instanceof DestructiveOperationError) {
    for (const step of error.completedSteps) {
      lines.push(`  ${green('done')}    ${step}`);
    }
    for (const step of error.remainingSteps) {
      lines.push(`  ${red('pending')} ${step}`);
    }
  }
  if ((error instanceof FatalError || error instanceof ValidationError) && error.suggestion) {
    lines.push(formatSuggestion(error.suggestion));
  }
  return lines.join('\n');
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Warnings go to stderr and never change the exit code.
 */
export function printWarnings(warnings: readonly string[]): void {
  for (const warning of warnings) {
    printError(formatWarning(warning));
  }
}

/**
 * Report a failed command and mark the process as failed.
 */
export function failCommand(error: unknown): void {
  printError(formatFailure(error));
  process.exitCode = 1;
}
