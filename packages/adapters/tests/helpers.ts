// ═════════════════════════════════════════════════════════════
// Test Helpers — scripted fetch and fixtures
// ═════════════════════════════════════════════════════════════

import type { MarketSnapshot } from "@edgeline/contracts";
import type { FetchLike } from "../src/http/fetchWithRetry";

export const TEST_NOW = new Date("2025-06-15T12:00:00.000Z");

export interface RecordedCall {
  readonly url: string;
  readonly init: RequestInit | undefined;
}

/**
 * fetch stand-in answering from a queue of scripted replies.
 * A reply is either [status, body] or "hang" (waits for abort).
 */
export type ScriptedReply = readonly [number, unknown] | "hang";

export function scriptedFetch(replies: ScriptedReply[]): { fetchImpl: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const queue = [...replies];

  const fetchImpl: FetchLike = (url, init) => {
    calls.push({ url, init });
    const reply = queue.shift();
    if (reply === undefined) {
      return Promise.reject(new Error(`unexpected request to ${url}`));
    }
    if (reply === "hang") {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener(
          "abort",
          () => {
            const err = new Error("The operation was aborted");
            err.name = "AbortError";
            reject(err);
          },
          { once: true }
        );
      });
    }
    const [status, body] = reply;
    return Promise.resolve(
      new Response(JSON.stringify(body), {
        status,
        headers: { "Content-Type": "application/json" },
      })
    );
  };

  return { fetchImpl, calls };
}

export function makeSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return {
    market_id: "mkt-1",
    yes_price: 0.4,
    volume_24h: { status: "REPORTED", value: 5000 },
    liquidity: 2000,
    end_date: "2025-07-01T00:00:00.000Z",
    observed_at: TEST_NOW.toISOString(),
    ...overrides,
  };
}
