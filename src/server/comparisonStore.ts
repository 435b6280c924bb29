import type { Comparison } from "../core/diff/schema.js";

/** In-memory comparisons, oldest evicted first once `limit` is reached. */
export class ComparisonStore {
  private readonly entries = new Map<string, Comparison>();

  public constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Comparison store limit must be a positive integer, got ${limit}`);
    }
  }

  public add(comparison: Comparison): void {
    this.entries.delete(comparison.id);
    this.entries.set(comparison.id, comparison);
    for (const oldestId of this.entries.keys()) {
      if (this.entries.size <= this.limit) break;
      this.entries.delete(oldestId);
    }
  }

  public get(id: string): Comparison | undefined {
    return this.entries.get(id);
  }

  public has(id: string): boolean {
    return this.entries.has(id);
  }

  public delete(id: string): boolean {
    return this.entries.delete(id);
  }

  public get size(): number {
    return this.entries.size;
  }

  public list(): Comparison[] {
    return [...this.entries.values()];
  }
}
