// ═════════════════════════════════════════════════════════════
// Deadline
// Runs an abortable operation against a timer. When the timer wins
// the operation is aborted and abandoned; its late settlement is
// only reported through onLateSettle.
// ═════════════════════════════════════════════════════════════

import { DeadlineExceededError } from "../errors";

export type LateSettlement =
  | { readonly status: "fulfilled" }
  | { readonly status: "rejected"; readonly reason: unknown };

export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onLateSettle?: (settlement: LateSettlement) => void
): Promise<T> {
  const controller = new AbortController();
  const pending = operation(controller.signal);
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      void pending.then(
        () => onLateSettle?.({ status: "fulfilled" }),
        (reason: unknown) => onLateSettle?.({ status: "rejected", reason })
      );
      reject(new DeadlineExceededError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([pending, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
