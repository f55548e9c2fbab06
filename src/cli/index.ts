#!/usr/bin/env node
import 'dotenv/config';
/**
 * tradeloop CLI
 *
 * Runs the trading loop, a one-off startup recovery, or shows recent cycles.
 */

import { Command } from 'commander';

import { VERSION, createAgent } from '../index.js';
import type { TradingLoopAgent } from '../agent/loop.js';
import { loadConfig, type TradeLoopConfig } from '../core/config.js';
import { describeError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { closeDatabase } from '../memory/db.js';
import { SqliteOutcomeMemory } from '../memory/cycle_outcomes.js';

const program = new Command();

program
  .name('tradeloop')
  .description('Risk-gated autonomous trading loop')
  .version(VERSION);

function attachReporters(agent: TradingLoopAgent, logger: Logger): void {
  agent.on('recovery_complete', (report) => {
    logger.info(
      `Recovery: ${report.positionsFound} found, ${report.positionsKept} kept, closed [${report.closed.join(', ')}], ${report.actionsTaken} action(s)${report.degraded ? ' (degraded)' : ''}`
    );
  });
  agent.on('recovery_failed', ({ error }) => logger.error(`Recovery failed: ${error}`));
  agent.on('risk_rejected', (e) => logger.warn(`Rejected ${e.action} ${e.assetPair}: ${e.reason}`));
  agent.on('trade_executed', (e) =>
    logger.info(`Executed ${e.action} ${e.size} ${e.assetPair} (trade ${e.tradeId})`)
  );
  agent.on('trade_failed', (e) =>
    logger.warn(`Failed ${e.action} ${e.assetPair}: ${e.reason}${e.timedOut ? ' (timeout)' : ''}`)
  );
  agent.on('kill_switch_triggered', (e) =>
    logger.error(
      `Kill switch: unrealized ${(e.unrealizedPnlPct * 100).toFixed(2)}% past -${(e.thresholdPct * 100).toFixed(2)}%`
    )
  );
  agent.on('invariant_violation', (e) => logger.error(`Invariant violation: ${e.error}`));
  agent.on('cycle_complete', (outcome) =>
    logger.info(`Cycle ${outcome.cycleId.slice(0, 8)} ${outcome.assetPair}: ${outcome.outcome}`)
  );
}

function loadOrExit(path?: string): TradeLoopConfig {
  try {
    return loadConfig(path);
  } catch (error) {
    console.error(describeError(error));
    process.exit(1);
  }
}

program
  .command('run')
  .description('Recover, then run the trading loop')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('--once', 'Run recovery and a single cycle, then exit')
  .action(async (options: { config?: string; once?: boolean }) => {
    const config = loadOrExit(options.config);
    const logger = new Logger(config.logging.level);
    const agent = createAgent(config, { logger });
    attachReporters(agent, logger);

    if (options.once) {
      await agent.runCycle();
      await agent.stop();
      closeDatabase(config.memory.dbPath);
      if (agent.isHalted) process.exitCode = 1;
      return;
    }

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, stopping after the current cycle`);
      agent
        .stop()
        .then(() => closeDatabase(config.memory.dbPath))
        .catch((error) => {
          logger.error('Shutdown failed', error);
          process.exitCode = 1;
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    await agent.start();
    if (agent.isHalted) {
      process.exitCode = 1;
    }
  });

program
  .command('recover')
  .description('Run startup recovery against the venue and exit')
  .option('-c, --config <path>', 'Path to config.yaml')
  .action(async (options: { config?: string }) => {
    const config = loadOrExit(options.config);
    const logger = new Logger(config.logging.level);
    const agent = createAgent(config, { logger });
    attachReporters(agent, logger);

    const state = await agent.tick();
    await agent.stop();
    closeDatabase(config.memory.dbPath);
    console.log(`Agent state after recovery: ${state}${agent.isHalted ? ' (halted)' : ''}`);
    if (agent.isHalted) process.exitCode = 1;
  });

program
  .command('status')
  .description('Show recent cycle outcomes')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('-l, --limit <number>', 'Number of cycles', '20')
  .action((options: { config?: string; limit: string }) => {
    const config = loadOrExit(options.config);
    const limit = Number(options.limit);
    if (!Number.isInteger(limit) || limit <= 0) {
      console.log('Limit must be a positive integer.');
      return;
    }
    const outcomes = new SqliteOutcomeMemory(config.memory.dbPath).listRecentOutcomes(limit);
    if (outcomes.length === 0) {
      console.log('No cycles recorded.');
      return;
    }
    for (const outcome of outcomes) {
      const detail = [outcome.action, outcome.reason, outcome.tradeId].filter(Boolean).join(' ');
      console.log(`[${outcome.finishedAt}] ${outcome.assetPair} ${outcome.outcome}${detail ? ` ${detail}` : ''}`);
    }
    closeDatabase(config.memory.dbPath);
  });

program.parseAsync().catch((error) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
