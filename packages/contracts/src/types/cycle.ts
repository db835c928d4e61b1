import { z } from "zod";
import {
  CycleFailureSchema,
  CycleRequestSchema,
  CycleSummarySchema,
  FailureKindEnum,
} from "../schemas/cycle.schema";

// ─────────────────────────────────────────────────────────────
// Types inferred from the cycle schemas
// ─────────────────────────────────────────────────────────────

export type CycleRequest = z.infer<typeof CycleRequestSchema>;
/** Request as accepted from callers, before defaults are applied. */
export type CycleRequestInput = z.input<typeof CycleRequestSchema>;
export type FailureKind = z.infer<typeof FailureKindEnum>;
export type CycleFailure = z.infer<typeof CycleFailureSchema>;
export type CycleSummary = z.infer<typeof CycleSummarySchema>;
