// ═════════════════════════════════════════════════════════════
// @edgeline/adapters — HTTP probability model
// POST {baseUrl}/predict with the snapshot; the answer is parsed
// through ProbabilityEstimateSchema before anyone sees it.
// ═════════════════════════════════════════════════════════════

import { ProbabilityEstimateSchema, ReasonCode } from "@edgeline/contracts";
import type { MarketSnapshot, ProbabilityEstimate } from "@edgeline/contracts";
import { ModelServiceError } from "@edgeline/core";
import type { ProbabilityModel } from "@edgeline/core";
import { HttpError, fetchWithRetry, readJson } from "../http/fetchWithRetry";
import type { FetchLike } from "../http/fetchWithRetry";

export interface HttpModelOptions {
  readonly baseUrl: string;
  /** Sent as a Bearer token when set */
  readonly apiKey?: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  readonly backoffMs?: number;
  readonly fetchImpl?: FetchLike;
}

export class HttpProbabilityModel implements ProbabilityModel {
  private readonly endpoint: string;

  constructor(private readonly options: HttpModelOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/predict`;
  }

  async predict(snapshot: MarketSnapshot, signal?: AbortSignal): Promise<ProbabilityEstimate> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    let body: unknown;
    try {
      const response = await fetchWithRetry(
        this.endpoint,
        { method: "POST", headers, body: JSON.stringify(snapshot) },
        {
          signal,
          timeoutMs: this.options.timeoutMs,
          maxRetries: this.options.maxRetries,
          backoffMs: this.options.backoffMs,
          fetchImpl: this.options.fetchImpl,
        }
      );
      if (!response.ok) {
        throw new ModelServiceError(
          `Model answered HTTP ${response.status} for ${snapshot.market_id}`
        );
      }
      body = await readJson(response, this.endpoint);
    } catch (error: unknown) {
      if (error instanceof ModelServiceError) throw error;
      const message = error instanceof HttpError ? error.message : String(error);
      throw new ModelServiceError(message, ReasonCode.MODEL_PREDICTION_FAILED, { cause: error });
    }

    const parsed = ProbabilityEstimateSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ModelServiceError(
        `Invalid model response for ${snapshot.market_id}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`,
        ReasonCode.MODEL_INVALID_RESPONSE
      );
    }
    if (parsed.data.market_id !== snapshot.market_id) {
      throw new ModelServiceError(
        `Model answered for ${parsed.data.market_id}, asked for ${snapshot.market_id}`,
        ReasonCode.MODEL_INVALID_RESPONSE
      );
    }
    return parsed.data;
  }
}
