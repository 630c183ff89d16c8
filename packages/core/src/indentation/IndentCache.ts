const PREALLOCATED_LEVELS = 8;

/**
 * Memoized leading whitespace for each nesting depth. Entry `n` holds
 * `n * factor` spaces; missing levels are built on first request.
 */
export class IndentCache {
  private static readonly shared = new Map<number, IndentCache>();

  private readonly entries: string[] = [];

  constructor(readonly factor: number) {
    if (!Number.isInteger(factor) || factor < 0) {
      throw new RangeError(`Indent factor must be a non-negative integer, got ${factor}`);
    }
    for (let level = 0; level < PREALLOCATED_LEVELS; level++) {
      this.entries.push(this.build(level));
    }
  }

  /**
   * Process-wide cache for the given factor, shared by every writer that
   * indents by the same amount.
   */
  static forFactor(factor: number): IndentCache {
    let cache = IndentCache.shared.get(factor);
    if (!cache) {
      cache = new IndentCache(factor);
      IndentCache.shared.set(factor, cache);
    }
    return cache;
  }

  indentFor(depth: number): string {
    if (!Number.isInteger(depth) || depth < 0) {
      throw new RangeError(`Depth must be a non-negative integer, got ${depth}`);
    }
    const cached = this.entries[depth];
    if (cached !== undefined) return cached;

    for (let level = this.entries.length; level < depth; level++) {
      this.entries.push(this.build(level));
    }
    const entry = this.build(depth);
    this.entries.push(entry);
    return entry;
  }

  /** Number of depths currently memoized. */
  get size(): number {
    return this.entries.length;
  }

  private build(level: number): string {
    return " ".repeat(level * this.factor);
  }
}
