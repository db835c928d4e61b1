// ═════════════════════════════════════════════════════════════
// @edgeline/adapters — Public entry point
// ═════════════════════════════════════════════════════════════
// Outside-world implementations of the collaborator contracts
// declared in @edgeline/core.
// ═════════════════════════════════════════════════════════════

// ─── HTTP ───────────────────────────────────────────────────
export { fetchWithRetry, readJson, HttpError } from "./http/fetchWithRetry";
export type { FetchLike, RetryOptions } from "./http/fetchWithRetry";

// ─── Market data ────────────────────────────────────────────
export {
  GammaMarketDataProvider,
  GammaMarketSchema,
  GAMMA_DEFAULT_BASE_URL,
  normalizeGammaMarket,
} from "./market/gamma";
export type { GammaMarket, GammaProviderOptions } from "./market/gamma";

// ─── Model ──────────────────────────────────────────────────
export { HttpProbabilityModel } from "./model/httpProbabilityModel";
export type { HttpModelOptions } from "./model/httpProbabilityModel";

// ─── Persistence ────────────────────────────────────────────
export { InMemoryPersistenceStore } from "./store/inMemoryPersistenceStore";
export type { StoredSignal, StoredSnapshot } from "./store/inMemoryPersistenceStore";
