/**
 * HTTP adapters for the market-data and decision-provider ports.
 *
 * Both speak plain JSON. Responses are validated with zod before they are
 * turned into domain values; anything malformed surfaces as an error, which
 * the loop maps to its stage fallback.
 */

import { randomUUID } from 'node:crypto';

import fetch from 'node-fetch';
import { z } from 'zod';

import type { DecisionProvider, MarketDataSource, PortfolioContext } from '../agent/ports.js';
import type { Decision, MarketSnapshot } from '../agent/types.js';
import { normalizePct } from '../core/config.js';
import { Logger } from '../core/logger.js';

const SnapshotSchema = z.object({
  assetPair: z.string().min(1),
  price: z.number().positive(),
  collectedAt: z.string().min(1),
  volatility: z.number().optional(),
  trend: z.enum(['up', 'down', 'flat']).optional(),
  rsi: z.number().optional(),
  sentimentScore: z.number().optional(),
  returns: z.array(z.number()).optional(),
});

const ReturnSeriesSchema = z.object({
  returns: z.record(z.array(z.number())),
});

const DecisionSchema = z.object({
  id: z.string().min(1).optional(),
  action: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(['BUY', 'SELL', 'HOLD'])),
  confidence: z.number().min(0).max(100),
  recommendedPositionSize: z.number().positive().optional(),
  stopLossFraction: z.number().positive().optional(),
  providers: z.array(z.string()).default([]),
  reasoning: z.string().optional(),
  createdAt: z.string().optional(),
});

const DecisionResponseSchema = z.object({
  decision: DecisionSchema.nullable(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

interface HttpClientOptions {
  apiKey?: string;
  logger?: Logger;
}

function headers(apiKey?: string): Record<string, string> {
  const base: Record<string, string> = { 'Content-Type': 'application/json' };
  if (apiKey) {
    base.Authorization = `Bearer ${apiKey}`;
  }
  return base;
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

export class HttpMarketDataSource implements MarketDataSource {
  private baseUrl: string;
  private logger: Logger;

  constructor(
    baseUrl: string,
    private options: HttpClientOptions = {}
  ) {
    this.baseUrl = trimSlash(baseUrl);
    this.logger = options.logger ?? new Logger('info');
  }

  async fetchSnapshot(assetPair: string, signal?: AbortSignal): Promise<MarketSnapshot> {
    const url = new URL(`${this.baseUrl}/snapshot`);
    url.searchParams.set('pair', assetPair);
    const response = await fetch(url.toString(), {
      headers: headers(this.options.apiKey),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Market data request failed: ${response.status}`);
    }
    const parsed = SnapshotSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Invalid market snapshot: ${describeIssues(parsed.error)}`);
    }
    this.logger.debug(`Snapshot ${assetPair} @ ${parsed.data.price} (${parsed.data.collectedAt})`);
    return { ...parsed.data, assetPair: parsed.data.assetPair.toUpperCase() };
  }

  async fetchReturnSeries(
    assetPairs: string[],
    signal?: AbortSignal
  ): Promise<Record<string, number[]>> {
    const url = new URL(`${this.baseUrl}/returns`);
    url.searchParams.set('pairs', assetPairs.join(','));
    const response = await fetch(url.toString(), {
      headers: headers(this.options.apiKey),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Return series request failed: ${response.status}`);
    }
    const parsed = ReturnSeriesSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Invalid return series: ${describeIssues(parsed.error)}`);
    }
    const series: Record<string, number[]> = {};
    for (const [pair, values] of Object.entries(parsed.data.returns)) {
      series[pair.toUpperCase()] = values;
    }
    return series;
  }
}

export class HttpDecisionProvider implements DecisionProvider {
  private baseUrl: string;
  private logger: Logger;

  constructor(
    baseUrl: string,
    private options: HttpClientOptions & { now?: () => number } = {}
  ) {
    this.baseUrl = trimSlash(baseUrl);
    this.logger = options.logger ?? new Logger('info');
  }

  async proposeDecision(
    snapshot: MarketSnapshot,
    portfolio: PortfolioContext,
    signal?: AbortSignal
  ): Promise<Decision | null> {
    const response = await fetch(`${this.baseUrl}/decision`, {
      method: 'POST',
      headers: headers(this.options.apiKey),
      body: JSON.stringify({ snapshot, portfolio }),
      signal,
    });
    if (response.status === 204) {
      return null;
    }
    if (!response.ok) {
      throw new Error(`Decision provider failed: ${response.status}`);
    }
    const parsed = DecisionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Invalid decision payload: ${describeIssues(parsed.error)}`);
    }
    const raw = parsed.data.decision;
    if (!raw) {
      this.logger.info(`Decision provider returned no decision for ${snapshot.assetPair}`);
      return null;
    }

    const now = this.options.now ?? Date.now;
    return {
      id: raw.id ?? randomUUID(),
      assetPair: snapshot.assetPair,
      action: raw.action,
      confidence: normalizePct(raw.confidence),
      recommendedPositionSize: raw.recommendedPositionSize,
      stopLossFraction:
        raw.stopLossFraction === undefined ? undefined : normalizePct(raw.stopLossFraction),
      provenance: { providers: raw.providers, reasoning: raw.reasoning },
      createdAt: raw.createdAt ?? new Date(now()).toISOString(),
    };
  }
}
