import {
  countAggregated,
  renderDiagnostics,
  renderRunSummary,
  renderSignalReport,
  renderUnhandled,
  summarizeTransactions,
  type RemapTable,
  type ReportFormat,
  type Summary,
  type Transaction,
} from '@whale-signal/core';
import type { FeedClient, FeedError, TimeWindow } from '@whale-signal/feed';
import type { ChatNotifier, NotifyResult } from '@whale-signal/notifier';
import type { Logger } from './lib/logger.js';

/**
 * Everything a single run needs. The CLI builds the real clients; tests pass fakes.
 */
export interface SignalJobDeps {
  feed: Pick<FeedClient, 'fetchWindow'>;
  notifier: Pick<ChatNotifier, 'sendReport' | 'sendLog'>;
  logger: Logger;
  window: TimeWindow;
  report: {
    format: ReportFormat;
    significanceFloorUsd: number;
    sendRunSummary: boolean;
  };
  stablecoins: readonly string[];
  remap: RemapTable;

  /** Store observed wallets; returns rows written. Failures are logged and ignored. */
  recordWallets?: (transactions: readonly Transaction[]) => number;
}

export interface SignalJobResult {
  transactionCount: number;
  feedError?: FeedError;
  summary?: Summary;

  /** Rendered report, empty when nothing cleared the significance floor */
  report: string;
  reportSent: boolean;
  walletsRecorded?: number;
  failedNotifications: number;
}

type Destination = 'report' | 'log';

/**
 * Fetch, classify, aggregate, render and deliver one window.
 *
 * Never throws for feed, notification or address book failures: feed errors and
 * skipped feed items go to the log chat, the rest is logged locally.
 */
export async function runSignalJob(deps: SignalJobDeps): Promise<SignalJobResult> {
  const { feed, notifier, logger, window } = deps;
  let failedNotifications = 0;

  async function deliver(destination: Destination, text: string): Promise<boolean> {
    const result: NotifyResult =
      destination === 'report' ? await notifier.sendReport(text) : await notifier.sendLog(text);

    if (result.success) {
      logger.debug({ destination, attempts: result.attempts, durationMs: result.durationMs }, 'Message delivered');
      return true;
    }

    failedNotifications++;
    logger.error(
      { destination, statusCode: result.statusCode, attempts: result.attempts, error: result.error },
      'Message delivery failed'
    );
    return false;
  }

  logger.info({ start: window.start, end: window.end }, 'Fetching transactions');

  const fetched = await feed.fetchWindow(window);

  logger.info(
    { transactions: fetched.transactions.length, pages: fetched.pages, requests: fetched.requests },
    'Fetch complete'
  );

  if (fetched.error) {
    logger.error({ kind: fetched.error.kind, httpStatus: fetched.error.httpStatus, err: fetched.error }, 'Feed error');
    await deliver('log', fetched.error.message);
  }

  if (fetched.skipped.length > 0) {
    logger.warn({ skipped: fetched.skipped.length }, 'Malformed feed items skipped');
    await deliver('log', renderDiagnostics('skipped feed items', fetched.skipped));
  }

  const transactionCount = fetched.transactions.length;

  if (transactionCount === 0) {
    logger.info('No transactions in window');
    return {
      transactionCount,
      feedError: fetched.error,
      report: '',
      reportSent: false,
      failedNotifications,
    };
  }

  let walletsRecorded: number | undefined;
  if (deps.recordWallets) {
    try {
      walletsRecorded = deps.recordWallets(fetched.transactions);
      logger.debug({ wallets: walletsRecorded }, 'Address book updated');
    } catch (error) {
      logger.warn({ err: error }, 'Address book update failed');
    }
  }

  const summary = summarizeTransactions(fetched.transactions, deps.remap);

  logger.info(
    { counts: summary.counts, aggregated: countAggregated(summary), unhandled: summary.unhandled.length },
    'Transactions classified'
  );

  if (summary.unhandled.length > 0) {
    await deliver('log', renderUnhandled(summary.unhandled));
  }

  if (deps.report.sendRunSummary) {
    await deliver(
      'log',
      renderRunSummary({
        transactionCount,
        start: window.start,
        end: window.end,
        requestUrl: fetched.requestUrl,
      })
    );
  }

  const report = renderSignalReport(summary, {
    stablecoins: deps.stablecoins,
    significanceFloorUsd: deps.report.significanceFloorUsd,
    format: deps.report.format,
  });

  let reportSent = false;
  if (report === '') {
    logger.info({ floorUsd: deps.report.significanceFloorUsd }, 'Nothing above the significance floor; no report sent');
  } else {
    reportSent = await deliver('report', report);
  }

  return {
    transactionCount,
    feedError: fetched.error,
    summary,
    report,
    reportSent,
    walletsRecorded,
    failedNotifications,
  };
}
