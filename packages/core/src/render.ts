import { analyzeSummary, type AnalyzeOptions, type SignalLine, type SignalReport } from './analyze.js';
import type { Summary } from './summarize.js';

/**
 * Output format. Markdown is what the chat endpoint receives.
 */
export type ReportFormat = 'plain' | 'markdown';

const usdFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Whole-dollar USD with thousands separators, e.g. "$2,000,000"
 */
export function formatUsd(amount: number): string {
  return `$${usdFormatter.format(Math.round(Math.abs(amount)))}`;
}

/**
 * Format one report line
 */
export function formatSignalLine(line: SignalLine, format: ReportFormat = 'plain'): string {
  const amount = formatUsd(line.amountUsd);
  if (format === 'markdown') {
    return `  \`${line.symbol.padEnd(5)}\`: ${amount} (${line.direction})`;
  }
  return `${line.symbol}: ${amount} (${line.direction})`;
}

/**
 * Render sections as text, lines sorted by symbol. An empty report renders as ''.
 */
export function renderReport(report: SignalReport, format: ReportFormat = 'plain'): string {
  const out: string[] = [];
  for (const section of report.sections) {
    out.push(`${section.title}:`);
    const lines = [...section.lines].sort((a, b) => a.symbol.localeCompare(b.symbol));
    for (const line of lines) {
      out.push(formatSignalLine(line, format));
    }
  }
  return out.join('\n');
}

/**
 * Analyze and render in one step
 */
export function renderSignalReport(
  summary: Pick<Summary, 'supply' | 'flow'>,
  options: AnalyzeOptions & { format?: ReportFormat }
): string {
  return renderReport(analyzeSummary(summary, options), options.format);
}

/**
 * Titled diagnostic message for the log destination, one indented line per entry
 */
export function renderDiagnostics(title: string, lines: readonly string[]): string {
  return [`${title}:`, ...lines.map((line) => `  ${line}`)].join('\n');
}

export function renderUnhandled(lines: readonly string[]): string {
  return renderDiagnostics('unhandled', lines);
}

/**
 * Header describing what a run covered
 */
export function renderRunSummary(params: {
  transactionCount: number;
  start: number;
  end: number;
  requestUrl: string;
}): string {
  const from = new Date(params.start * 1000).toISOString();
  const to = new Date(params.end * 1000).toISOString();
  return `[${params.transactionCount} whale transactions](${params.requestUrl}) from ${from} to ${to}`;
}
