import { createHash } from "node:crypto";
import { align, type AlignOptions } from "./diff/aligner.js";
import type { Comparison } from "./diff/schema.js";
import { summarize } from "./diff/summary.js";

export interface CompareInput {
  oldName: string;
  newName: string;
  oldText: string;
  newText: string;
}

const comparisonId = (input: CompareInput, createdAt: string): string =>
  createHash("sha256")
    .update(`${input.oldName}\u0000${input.newName}\u0000${input.oldText}\u0000${input.newText}\u0000${createdAt}`)
    .digest("hex")
    .slice(0, 16);

export class ComparisonEngine {
  public constructor(private readonly options: AlignOptions = {}) {}

  public run(input: CompareInput, now: Date = new Date()): Comparison {
    const createdAt = now.toISOString();
    const records = align(input.oldText, input.newText, this.options);
    return {
      id: comparisonId(input, createdAt),
      oldName: input.oldName,
      newName: input.newName,
      createdAt,
      records,
      summary: summarize(records),
    };
  }
}
