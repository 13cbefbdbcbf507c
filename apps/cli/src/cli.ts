#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';
import { ConfigError, loadConfig, maskSecret, type AppConfig } from '@whale-signal/config';
import { createDefaultRegistry } from '@whale-signal/core';
import { createFeedClient, type TimeWindow } from '@whale-signal/feed';
import { createNotifier } from '@whale-signal/notifier';
import { openAddressBook, upsertWallets } from '@whale-signal/address-book';
import { parseInteger } from './lib/args.js';
import { createLogger, type Logger } from './lib/logger.js';
import { findWallets, formatWalletRecord, type AddressBook } from './lib/wallets.js';
import { computeWindow, DEFAULT_INTERVAL_MINUTES } from './lib/window.js';
import { runSignalJob } from './run.js';

interface RunOptions {
  config: string;
  start?: number;
  end?: number;
  interval: number;
}

interface CheckConfigOptions {
  config: string;
}

interface WalletsOptions {
  config: string;
  blockchain: string;
  ownerType?: string;
}

/**
 * Load configuration or exit with status 1
 */
function loadConfigOrExit(path: string): AppConfig {
  try {
    return loadConfig(path);
  } catch (err) {
    console.error(pc.red(err instanceof ConfigError ? 'Configuration Error:' : 'Unexpected Error:'));
    console.error(pc.red(`  ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }
}

function openAddressBookSafely(config: AppConfig, logger: Logger): AddressBook | undefined {
  if (!config.addressBook.enabled) return undefined;

  try {
    return openAddressBook(config.addressBook.dbPath);
  } catch (err) {
    logger.warn({ err, dbPath: config.addressBook.dbPath }, 'Address book unavailable');
    return undefined;
  }
}

const program = new Command();

program
  .name('whale-signal')
  .description('Turn large on-chain transactions into a bull/bear signal report')
  .version('0.1.0');

/**
 * Run command - fetch one window and deliver the report
 */
program
  .command('run', { isDefault: true })
  .description('Fetch a window of whale transactions and send the signal report')
  .option('-c, --config <path>', 'Path to the JSON configuration file', 'config.json')
  .option('--start <unix>', 'Window start in unix seconds', parseInteger)
  .option('--end <unix>', 'Window end in unix seconds (inclusive)', parseInteger)
  .option('--interval <minutes>', 'Window length when start or end is omitted', parseInteger, DEFAULT_INTERVAL_MINUTES)
  .action(async (options: RunOptions) => {
    const config = loadConfigOrExit(options.config);
    const logger = createLogger(config.logging.level, config.logging.format);

    let window: TimeWindow;
    try {
      window = computeWindow(Date.now(), options.interval, options.start, options.end);
    } catch (err) {
      logger.fatal({ err }, 'Invalid time window');
      process.exitCode = 1;
      return;
    }

    const feed = createFeedClient({
      url: config.feed.url,
      apiKey: config.feed.apiKey,
      minValue: config.feed.minValue,
      limit: config.feed.limit,
      timeoutMs: config.feed.timeoutMs,
    });
    const notifier = createNotifier(config.telegram);
    const addressBook = openAddressBookSafely(config, logger);

    try {
      const result = await runSignalJob({
        feed,
        notifier,
        logger,
        window,
        report: config.report,
        stablecoins: config.stablecoins,
        remap: config.remap,
        recordWallets: addressBook ? (transactions) => upsertWallets(addressBook, transactions) : undefined,
      });

      logger.info(
        {
          transactions: result.transactionCount,
          reportSent: result.reportSent,
          failedNotifications: result.failedNotifications,
        },
        'Run complete'
      );
    } finally {
      addressBook?.close();
    }
  });

/**
 * Check config command - validates and prints the effective configuration
 */
program
  .command('check-config')
  .description('Validate the configuration file and print the effective settings')
  .option('-c, --config <path>', 'Path to the JSON configuration file', 'config.json')
  .action((options: CheckConfigOptions) => {
    console.log(pc.bold('\nConfiguration Validation\n'));
    console.log(pc.gray(`Loading from: ${options.config}\n`));

    const config = loadConfigOrExit(options.config);

    const items = [
      { key: 'telegram.apiUrl', value: config.telegram.apiUrl },
      { key: 'telegram.botToken', value: maskSecret(config.telegram.botToken) },
      { key: 'telegram.recipientId', value: config.telegram.recipientId || '(not set)' },
      { key: 'telegram.logId', value: config.telegram.logId || '(not set)' },
      { key: 'telegram.maxRetries', value: config.telegram.maxRetries.toString() },
      { key: 'feed.url', value: config.feed.url },
      { key: 'feed.apiKey', value: maskSecret(config.feed.apiKey) },
      { key: 'feed.minValue', value: config.feed.minValue.toString() },
      { key: 'feed.limit', value: config.feed.limit.toString() },
      { key: 'report.significanceFloorUsd', value: config.report.significanceFloorUsd.toString() },
      { key: 'report.format', value: config.report.format },
      { key: 'stablecoins', value: config.stablecoins.join(', ') || '(none)' },
      { key: 'remap', value: Object.keys(config.remap).length.toString() + ' entries' },
      {
        key: 'addressBook',
        value: config.addressBook.enabled ? config.addressBook.dbPath : 'disabled',
      },
      { key: 'logging', value: `${config.logging.level} (${config.logging.format})` },
    ];

    for (const item of items) {
      console.log(`  ${pc.cyan(item.key)}: ${item.value}`);
    }

    console.log(`\n  ${pc.cyan('Classification Rules')}:`);
    for (const rule of createDefaultRegistry().getAll()) {
      console.log(`    - ${rule.metadata.id} (${rule.metadata.name})`);
    }

    if (!config.telegram.botToken || !config.feed.apiKey) {
      console.log('');
      console.log(pc.yellow('Warning: bot token or feed API key is not set.'));
    }

    console.log('');
    console.log(pc.green(pc.bold('Configuration is valid!')));
  });

/**
 * Wallets command - query the address book
 */
program
  .command('wallets [address]')
  .description('List wallets in the address book, or show the one stored for an address')
  .option('-c, --config <path>', 'Path to the JSON configuration file', 'config.json')
  .option('--blockchain <name>', 'Chain of the address to look up', 'ethereum')
  .option('--owner-type <type>', 'Only list wallets of this owner category')
  .action((address: string | undefined, options: WalletsOptions) => {
    const config = loadConfigOrExit(options.config);

    if (!config.addressBook.enabled) {
      console.error(pc.yellow('The address book is disabled (addressBook.enabled).'));
      process.exit(1);
    }

    const db = openAddressBook(config.addressBook.dbPath);
    try {
      const records = findWallets(db, { address, blockchain: options.blockchain, ownerType: options.ownerType });

      if (records.length === 0) {
        console.log(pc.gray(address === undefined ? 'No wallets recorded.' : `${address} is not in the address book.`));
        return;
      }

      for (const record of records) {
        console.log(formatWalletRecord(record));
      }
    } finally {
      db.close();
    }
  });

await program.parseAsync();
