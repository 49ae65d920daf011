/**
 * Counts of (current -> next) transitions. Probabilities are always derived
 * from the counts on demand and never stored.
 */

export interface RankedSymbol {
  symbol: string;
  probability: number;
  count: number;
  /** How often the symbol was observed as a successor across all contexts */
  totalObserved: number;
}

export class TransitionTable {
  private counts = new Map<string, Map<string, number>>();
  private contextTotals = new Map<string, number>();
  private symbolTotals = new Map<string, number>();

  record(current: string, next: string, delta: number = 1): void {
    if (!(delta > 0)) return;
    let row = this.counts.get(current);
    if (!row) {
      row = new Map();
      this.counts.set(current, row);
    }
    row.set(next, (row.get(next) ?? 0) + delta);
    this.contextTotals.set(current, (this.contextTotals.get(current) ?? 0) + delta);
    this.symbolTotals.set(next, (this.symbolTotals.get(next) ?? 0) + delta);
  }

  count(current: string, next: string): number {
    return this.counts.get(current)?.get(next) ?? 0;
  }

  contextTotal(current: string): number {
    return this.contextTotals.get(current) ?? 0;
  }

  hasContext(current: string): boolean {
    return this.counts.has(current);
  }

  /** Every symbol ever seen as a successor, sorted */
  alphabet(): string[] {
    return [...this.symbolTotals.keys()].sort();
  }

  /** Number of distinct (current, next) pairs */
  get size(): number {
    let n = 0;
    for (const row of this.counts.values()) n += row.size;
    return n;
  }

  /**
   * Next-symbol distribution for a context. An unseen context gets a uniform
   * distribution over the known alphabet (empty if nothing was ever recorded).
   */
  distribution(current: string): Map<string, number> {
    const row = this.counts.get(current);
    const total = this.contextTotal(current);
    if (!row || total <= 0) {
      const alphabet = this.alphabet();
      return new Map(alphabet.map((s) => [s, 1 / alphabet.length]));
    }
    return new Map([...row].map(([s, c]) => [s, c / total]));
  }

  /**
   * Additively smoothed P(next | current). One extra vocabulary slot is
   * reserved for symbols never seen, so the result is always positive.
   */
  smoothedProbability(current: string, next: string, epsilon: number): number {
    const vocab = this.symbolTotals.size + 1;
    if (!this.hasContext(current)) return 1 / vocab;
    return (this.count(current, next) + epsilon) / (this.contextTotal(current) + epsilon * vocab);
  }

  /**
   * Top-k successors by probability. Ties go to the symbol with the lower
   * total observed count (the less explored option), then lexical order.
   */
  predict(current: string, k: number): RankedSymbol[] {
    const ranked = [...this.distribution(current)].map(([symbol, probability]) => ({
      symbol,
      probability,
      count: this.count(current, symbol),
      totalObserved: this.symbolTotals.get(symbol) ?? 0,
    }));
    ranked.sort(
      (a, b) =>
        b.probability - a.probability ||
        a.totalObserved - b.totalObserved ||
        a.symbol.localeCompare(b.symbol),
    );
    return ranked.slice(0, Math.max(0, k));
  }

  *transitions(): Generator<[string, string, number]> {
    for (const [current, row] of this.counts) {
      for (const [next, count] of row) yield [current, next, count];
    }
  }
}
