/**
 * formatReport / renderTable - Turn a RunReport into an aligned text table
 *
 *   +-------+-----------+--------------------------+-- ...
 *   | Order | File name | Start time               |   ...
 *   |-------+-----------+--------------------------+-- ...
 *   |     1 | 1-a.sh    | Sun Oct 18 18:02:00 2026 |   ...
 *   +-------+-----------+--------------------------+-- ...
 */

import type { ReportEntry, RunReport, StepStatus } from '../kernel/contracts.js';

export type ColumnAlign = 'left' | 'right';

export const REPORT_HEADERS = [
  'Order',
  'File name',
  'Start time',
  'End time',
  'Time elapsed (mins)',
  'Status',
] as const;

export const REPORT_ALIGN: readonly ColumnAlign[] = ['right', 'left', 'left', 'left', 'right', 'left'];

export const NOT_AVAILABLE = 'NA';

const STATUS_LABELS: Record<StepStatus, string> = {
  'not-attempted': NOT_AVAILABLE,
  running: 'Running',
  success: 'Success',
  failure: 'Failure',
};

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** Local time as `Www Mmm dd HH:MM:SS yyyy`, independent of the process locale. */
export function formatTimestamp(date: Date): string {
  const day = String(date.getDate()).padStart(2, ' ');
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${DAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${day} ${time} ${date.getFullYear()}`;
}

export function formatElapsed(minutes: number): string {
  return minutes.toFixed(4);
}

function formatEntry(entry: ReportEntry): string[] {
  return [
    String(entry.order),
    entry.name,
    entry.startTime ? formatTimestamp(entry.startTime) : NOT_AVAILABLE,
    entry.endTime ? formatTimestamp(entry.endTime) : NOT_AVAILABLE,
    entry.elapsedMinutes !== undefined ? formatElapsed(entry.elapsedMinutes) : NOT_AVAILABLE,
    STATUS_LABELS[entry.status],
  ];
}

/** One row of cells per discovered step, in report order. */
export function formatReport(report: RunReport): string[][] {
  return report.entries.map(formatEntry);
}

/** Width in code points, so astral characters count once. */
function displayWidth(value: string): number {
  return [...value].length;
}

/**
 * Renders `rows` under `headers` with every column padded to its widest cell.
 * Missing cells render empty; `align` defaults to left for every column.
 */
export function renderTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  align: readonly ColumnAlign[] = [],
): string {
  const widths = headers.map((header, column) =>
    Math.max(displayWidth(header), ...rows.map((row) => displayWidth(row[column] ?? ''))),
  );

  const cell = (value: string, column: number): string => {
    const padding = ' '.repeat(widths[column] - displayWidth(value));
    return align[column] === 'right' ? `${padding}${value}` : `${value}${padding}`;
  };
  const line = (cells: readonly string[]): string =>
    `| ${widths.map((_, column) => cell(cells[column] ?? '', column)).join(' | ')} |`;
  const rule = (edge: string, joint: string): string =>
    `${edge}${widths.map((width) => '-'.repeat(width + 2)).join(joint)}${edge}`;

  return [
    rule('+', '+'),
    line(headers),
    rule('|', '+'),
    ...rows.map(line),
    rule('+', '+'),
  ].join('\n');
}

/** The full report as an aligned table. */
export function renderReport(report: RunReport): string {
  return renderTable(REPORT_HEADERS, formatReport(report), REPORT_ALIGN);
}
