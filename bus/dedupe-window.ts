/**
 * Remembers the most recent message ids so a redelivered copy is handled once.
 */
export class DedupeWindow {
  private readonly ids = new Set<string>();

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Dedupe window size must be a positive integer. Got: ${size}`);
    }
  }

  /** Records the id and reports whether it had already been seen. */
  check(id: string): boolean {
    if (this.ids.has(id)) {
      return true;
    }
    this.ids.add(id);
    if (this.ids.size > this.size) {
      const oldest = this.ids.values().next();
      if (!oldest.done) {
        this.ids.delete(oldest.value);
      }
    }
    return false;
  }
}
