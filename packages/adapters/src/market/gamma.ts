// ═════════════════════════════════════════════════════════════
// @edgeline/adapters — Gamma market data
// Polymarket-style Gamma API as a MarketDataProvider.
//
// Endpoints:
//   GET {base}/markets?active=true&closed=false&limit=N  → market list
//   GET {base}/markets/{id}                              → one market
//
// Volume that the API leaves out stays ABSENT; it is never read as 0.
// ═════════════════════════════════════════════════════════════

import { z } from "zod";
import { ReasonCode, MarketSnapshotSchema } from "@edgeline/contracts";
import type { MarketSnapshot, VolumeReading } from "@edgeline/contracts";
import { InputError, MarketDataError } from "@edgeline/core";
import type { MarketDataProvider } from "@edgeline/core";
import { HttpError, fetchWithRetry, readJson } from "../http/fetchWithRetry";
import type { FetchLike } from "../http/fetchWithRetry";

// ─── Constants ──────────────────────────────────────────────

export const GAMMA_DEFAULT_BASE_URL = "https://gamma-api.polymarket.com";

// ─── Raw Gamma market ───────────────────────────────────────

/** Gamma sends numbers either as JSON numbers or as decimal strings. */
const NumericLike = z.union([z.number(), z.string()]);

const GammaTokenSchema = z.object({
  outcome: z.string(),
  price: NumericLike,
});

export const GammaMarketSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    question: z.string().nullish(),
    outcomes: z.string().nullish(),
    outcomePrices: z.string().nullish(),
    tokens: z.array(GammaTokenSchema).nullish(),
    volume24hr: NumericLike.nullish(),
    volume24h: NumericLike.nullish(),
    liquidity: NumericLike.nullish(),
    liquidityNum: NumericLike.nullish(),
    endDate: z.string().nullish(),
    endDateIso: z.string().nullish(),
  })
  .passthrough();

export type GammaMarket = z.infer<typeof GammaMarketSchema>;

// ─── Normalization ──────────────────────────────────────────

function toNumber(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" && value.trim() === "") return null;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

function parseStringArray(json: string | null | undefined): string[] {
  if (!json) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return [];
  }
  return Array.isArray(parsed) ? parsed.map((v) => String(v)) : [];
}

/**
 * YES price from outcomePrices (aligned with outcomes) or from tokens[].
 */
function extractYesPrice(raw: GammaMarket): number | null {
  const prices = parseStringArray(raw.outcomePrices);
  if (prices.length > 0) {
    const outcomes = parseStringArray(raw.outcomes);
    const yesIndex = outcomes.findIndex((o) => o.toUpperCase() === "YES");
    return toNumber(prices[yesIndex >= 0 ? yesIndex : 0]);
  }
  const yesToken = raw.tokens?.find((t) => t.outcome.toUpperCase() === "YES");
  return yesToken ? toNumber(yesToken.price) : null;
}

function extractVolume(raw: GammaMarket): VolumeReading {
  const value = toNumber(raw.volume24hr ?? raw.volume24h);
  return value === null ? { status: "ABSENT" } : { status: "REPORTED", value };
}

function normalizeTimestamp(value: string): string | null {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

/**
 * Maps a raw Gamma record to a MarketSnapshot.
 *
 * @throws InputError when the record has no usable price or end date
 */
export function normalizeGammaMarket(input: unknown, observedAt: Date): MarketSnapshot {
  const parsed = GammaMarketSchema.safeParse(input);
  if (!parsed.success) {
    throw new InputError(`Unrecognized Gamma market: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  const raw = parsed.data;
  const marketId = String(raw.id);

  const yesPrice = extractYesPrice(raw);
  if (yesPrice === null) {
    throw new InputError(`Market ${marketId} has no YES price`, marketId);
  }
  const endDateRaw = raw.endDate ?? raw.endDateIso;
  const endDate = endDateRaw ? normalizeTimestamp(endDateRaw) : null;
  if (endDate === null) {
    throw new InputError(`Market ${marketId} has no usable end date`, marketId);
  }

  const snapshot = {
    market_id: marketId,
    ...(raw.question ? { question: raw.question } : {}),
    yes_price: yesPrice,
    volume_24h: extractVolume(raw),
    liquidity: toNumber(raw.liquidity ?? raw.liquidityNum),
    end_date: endDate,
    observed_at: observedAt.toISOString(),
  };

  const checked = MarketSnapshotSchema.safeParse(snapshot);
  if (!checked.success) {
    const issue = checked.error.issues[0];
    throw new InputError(
      `Market ${marketId} failed validation: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`,
      marketId
    );
  }
  return checked.data;
}

// ─── Provider ───────────────────────────────────────────────

export interface GammaProviderOptions {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  readonly backoffMs?: number;
  readonly fetchImpl?: FetchLike;
  readonly clock?: () => Date;
}

export class GammaMarketDataProvider implements MarketDataProvider {
  private readonly baseUrl: string;
  private readonly clock: () => Date;

  constructor(private readonly options: GammaProviderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? GAMMA_DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.clock = options.clock ?? (() => new Date());
  }

  async listActiveMarketIds(limit: number, signal?: AbortSignal): Promise<string[]> {
    const url = `${this.baseUrl}/markets?active=true&closed=false&limit=${limit}`;
    const body = await this.getJson(url, signal);
    if (!Array.isArray(body)) {
      throw new MarketDataError(`Expected an array from ${url}, got ${typeof body}`);
    }

    const ids: string[] = [];
    for (const entry of body) {
      const parsed = z.object({ id: z.union([z.string(), z.number()]) }).safeParse(entry);
      if (parsed.success) ids.push(String(parsed.data.id));
    }
    return ids.slice(0, limit);
  }

  async fetchSnapshots(ids: readonly string[], signal?: AbortSignal): Promise<MarketSnapshot[]> {
    const snapshots: MarketSnapshot[] = [];
    for (const id of ids) {
      const url = `${this.baseUrl}/markets/${encodeURIComponent(id)}`;
      const body = await this.getJson(url, signal);
      snapshots.push(normalizeGammaMarket(body, this.clock()));
    }
    return snapshots;
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await fetchWithRetry(
        url,
        { method: "GET", headers: { Accept: "application/json" } },
        {
          signal,
          timeoutMs: this.options.timeoutMs,
          maxRetries: this.options.maxRetries,
          backoffMs: this.options.backoffMs,
          fetchImpl: this.options.fetchImpl,
        }
      );
    } catch (error: unknown) {
      throw toMarketDataError(error);
    }

    if (response.status === 404) {
      throw new MarketDataError(`Not found: ${url}`, ReasonCode.PROV_MARKET_NOT_FOUND, 404);
    }
    if (!response.ok) {
      throw new MarketDataError(
        `HTTP ${response.status} ${response.statusText} from ${url}`,
        ReasonCode.PROV_HTTP_ERROR,
        response.status
      );
    }
    try {
      return await readJson(response, url);
    } catch (error: unknown) {
      throw toMarketDataError(error);
    }
  }
}

function toMarketDataError(error: unknown): MarketDataError {
  if (error instanceof HttpError) {
    return new MarketDataError(
      error.message,
      error.timedOut ? ReasonCode.PROV_TIMEOUT : ReasonCode.PROV_HTTP_ERROR,
      error.status ?? undefined,
      { cause: error }
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new MarketDataError(message, ReasonCode.PROV_DATA_ERROR, undefined, { cause: error });
}
