// ═════════════════════════════════════════════════════════════
// Mutex — promise chain
// Callers run one at a time in arrival order. A failing section
// rejects its own caller and does not block the next one.
// ═════════════════════════════════════════════════════════════

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(section);
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  /** Sections queued or running. */
  get size(): number {
    return this.pending;
  }

  private release(): void {
    this.pending -= 1;
  }
}
