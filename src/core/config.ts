import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { ConfigError } from './errors.js';
import { isLogLevel } from './logger.js';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

/**
 * Percent-like inputs may be written as whole percentages (5 meaning 5%).
 */
export const normalizePct = (value: number): number => (value > 1 ? value / 100 : value);

const ConfigSchema = z.object({
  agent: z
    .object({
      assetPairs: z.array(z.string().min(1)).min(1).default(['BTCUSD']),
      analysisFrequencySeconds: z.number().positive().default(300),
      minConfidence: z.number().min(0).max(100).default(0.6),
      maxDailyTrades: z.number().int().min(0).default(5),
      autonomousExecution: z.boolean().default(true),
      // 0 disables the kill switch.
      killSwitchLossPct: z.number().min(0).default(0),
      maxAnalysisFailures: z.number().int().positive().default(3),
      failureDecaySeconds: z.number().positive().default(3600),
    })
    .default({}),
  risk: z
    .object({
      stalenessSeconds: z.number().positive().default(900),
      maxClockSkewSeconds: z.number().min(0).default(60),
      correlationThreshold: z.number().min(0).max(1).default(0.7),
      maxCorrelatedAssets: z.number().int().positive().default(2),
      minCorrelationObservations: z.number().int().min(2).default(10),
      varConfidence: z.number().min(0.5).max(0.999).default(0.95),
      maxVarPct: z.number().positive().default(0.05),
      minVarObservations: z.number().int().min(2).default(30),
      maxLeverage: z.number().min(1).default(1),
      marginBufferPct: z.number().min(0).default(0.1),
      cooldownSeconds: z.number().min(0).default(900),
      maxConcurrentTrades: z.number().int().positive().default(2),
      riskPerTradePct: z.number().positive().default(0.01),
      defaultStopLossFraction: z.number().positive().max(1).default(0.02),
      maxPositionPct: z.number().positive().default(0.1),
    })
    .default({}),
  execution: z
    .object({
      mode: z.enum(['paper']).default('paper'),
      orderTimeoutMs: z.number().positive().default(15000),
      cancelTimeoutMs: z.number().positive().default(5000),
      reservationMaxAgeSeconds: z.number().positive().default(300),
      paper: z
        .object({
          startingBalance: z.number().positive().default(10000),
          currency: z.string().default('USD'),
        })
        .default({}),
    })
    .default({}),
  recovery: z
    .object({
      timeoutMs: z.number().positive().default(20000),
      retryBackoffMs: z.number().min(0).default(2000),
    })
    .default({}),
  timeouts: z
    .object({
      snapshotMs: z.number().positive().default(10000),
      decisionMs: z.number().positive().default(60000),
      venueMs: z.number().positive().default(10000),
    })
    .default({}),
  collaborators: z
    .object({
      marketDataUrl: z.string().url().optional(),
      decisionUrl: z.string().url().optional(),
      apiKey: z.string().optional(),
    })
    .default({}),
  memory: z
    .object({
      persist: z.boolean().default(true),
      dbPath: z.string().default('~/.tradeloop/tradeloop.sqlite'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type TradeLoopConfig = z.infer<typeof ConfigSchema>;
export type TradeLoopConfigInput = z.input<typeof ConfigSchema>;

export function parseConfig(raw: unknown): TradeLoopConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const cfg = result.data;

  cfg.agent.minConfidence = normalizePct(cfg.agent.minConfidence);
  cfg.agent.killSwitchLossPct = normalizePct(cfg.agent.killSwitchLossPct);
  cfg.agent.assetPairs = cfg.agent.assetPairs.map((pair) => pair.trim().toUpperCase());
  cfg.risk.maxVarPct = normalizePct(cfg.risk.maxVarPct);
  cfg.risk.marginBufferPct = normalizePct(cfg.risk.marginBufferPct);
  cfg.risk.riskPerTradePct = normalizePct(cfg.risk.riskPerTradePct);
  cfg.risk.maxPositionPct = normalizePct(cfg.risk.maxPositionPct);
  cfg.memory.dbPath = expandHome(cfg.memory.dbPath);

  return cfg;
}

export function loadConfig(configPath?: string): TradeLoopConfig {
  const path =
    configPath ??
    process.env.TRADELOOP_CONFIG_PATH ??
    join(homedir(), '.tradeloop', 'config.yaml');

  let raw: string;
  try {
    raw = readFileSync(expandHome(path), 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config at ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const parsed: unknown = yaml.parse(raw) ?? {};

  const cfg = parseConfig(parsed);

  const envLevel = process.env.TRADELOOP_LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    cfg.logging.level = envLevel;
  }
  const envDbPath = process.env.TRADELOOP_DB_PATH;
  if (envDbPath) {
    cfg.memory.dbPath = expandHome(envDbPath);
  }

  return cfg;
}
