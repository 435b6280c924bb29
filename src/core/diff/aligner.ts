import { getOpcodes, similarityRatio, type Opcode } from "./opcodes.js";
import type { DiffRecord } from "./schema.js";
import { PARAGRAPH_DELIMITER, splitParagraphs, splitSentences, splitWords } from "../text/segment.js";

export interface AlignOptions {
  /** Minimum word-level similarity for an old and a new sentence to be reported as one modification. */
  pairingThreshold?: number;
}

export const DEFAULT_PAIRING_THRESHOLD = 0.5;

/** Above this many old × new sentence cells, pairing falls back to a single in-order scan. */
export const MAX_PAIRING_CELLS = 40_000;

type PairingStep = "pair" | "old" | "new";

const equalRecord = (content: string): DiffRecord => ({ type: "equal", oldContent: content, newContent: content });

const deletedRecord = (content: string): DiffRecord => ({ type: "deleted", oldContent: content, newContent: "" });

const addedRecord = (content: string): DiffRecord => ({ type: "added", oldContent: "", newContent: content });

/* Linear fallback: an old sentence pairs with the next new sentence when
 * similar enough, otherwise it is skipped. Leftover new sentences trail. */
const pairSentencesInOrder = (oldWords: string[][], newWords: string[][], threshold: number): PairingStep[] => {
  const steps: PairingStep[] = [];
  let j = 0;
  for (const words of oldWords) {
    if (j < newWords.length && similarityRatio(words, newWords[j]) >= threshold) {
      steps.push("pair");
      j += 1;
    } else {
      steps.push("old");
    }
  }
  for (; j < newWords.length; j += 1) {
    steps.push("new");
  }
  return steps;
};

/* Monotone pairing of old and new sentences that maximizes total similarity.
 * Pairs below the threshold are never formed. On ties pairing wins, then
 * skipping the old sentence. */
const pairSentences = (oldSentences: string[], newSentences: string[], threshold: number): PairingStep[] => {
  const n = oldSentences.length;
  const m = newSentences.length;
  const oldWords = oldSentences.map(splitWords);
  const newWords = newSentences.map(splitWords);
  if ((n + 1) * (m + 1) > MAX_PAIRING_CELLS) {
    return pairSentencesInOrder(oldWords, newWords, threshold);
  }
  const best: number[][] = Array.from({ length: n + 1 }, () => Array<number>(m + 1).fill(0));
  const choice: PairingStep[][] = Array.from({ length: n + 1 }, () => Array<PairingStep>(m + 1).fill("old"));

  for (let i = n; i >= 0; i -= 1) {
    for (let j = m; j >= 0; j -= 1) {
      if (i === n && j === m) continue;
      let score = -1;
      let step: PairingStep = "old";
      if (i < n && j < m) {
        const similarity = similarityRatio(oldWords[i], newWords[j]);
        if (similarity >= threshold) {
          score = similarity + best[i + 1][j + 1];
          step = "pair";
        }
      }
      if (i < n && best[i + 1][j] > score) {
        score = best[i + 1][j];
        step = "old";
      }
      if (j < m && best[i][j + 1] > score) {
        score = best[i][j + 1];
        step = "new";
      }
      best[i][j] = score;
      choice[i][j] = step;
    }
  }

  const steps: PairingStep[] = [];
  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    const step = choice[i][j];
    steps.push(step);
    if (step !== "new") i += 1;
    if (step !== "old") j += 1;
  }
  return steps;
};

const pairReplacedSentences = (oldSentences: string[], newSentences: string[], threshold: number): DiffRecord[] => {
  const steps = pairSentences(oldSentences, newSentences, threshold);
  const records: DiffRecord[] = [];
  let i = 0;
  let j = 0;
  let cursor = 0;

  while (cursor < steps.length) {
    const runStart = cursor;
    const isPairRun = steps[cursor] === "pair";
    while (cursor < steps.length && (steps[cursor] === "pair") === isPairRun) {
      cursor += 1;
    }
    const run = steps.slice(runStart, cursor);
    const oldCount = run.filter((step) => step !== "new").length;
    const newCount = run.filter((step) => step !== "old").length;
    const oldContent = oldSentences.slice(i, i + oldCount).join(" ");
    const newContent = newSentences.slice(j, j + newCount).join(" ");
    i += oldCount;
    j += newCount;

    if (isPairRun) {
      records.push({ type: "modified", oldContent, newContent });
      continue;
    }
    if (oldCount > 0) records.push(deletedRecord(oldContent));
    if (newCount > 0) records.push(addedRecord(newContent));
  }
  return records;
};

/* Second and last pass: sentences of one replaced paragraph span. */
const refineReplacedSpan = (oldBlock: string, newBlock: string, threshold: number): DiffRecord[] => {
  const oldSentences = splitSentences(oldBlock);
  const newSentences = splitSentences(newBlock);
  const records: DiffRecord[] = [];

  for (const { tag, i1, i2, j1, j2 } of getOpcodes(oldSentences, newSentences)) {
    if (tag === "equal") {
      for (const sentence of oldSentences.slice(i1, i2)) {
        records.push(equalRecord(sentence));
      }
    } else if (tag === "delete") {
      records.push(deletedRecord(oldSentences.slice(i1, i2).join(" ")));
    } else if (tag === "insert") {
      records.push(addedRecord(newSentences.slice(j1, j2).join(" ")));
    } else {
      records.push(...pairReplacedSentences(oldSentences.slice(i1, i2), newSentences.slice(j1, j2), threshold));
    }
  }
  return records;
};

const recordsForParagraphOpcode = (
  { tag, i1, i2, j1, j2 }: Opcode,
  oldParagraphs: string[],
  newParagraphs: string[],
  threshold: number,
): DiffRecord[] => {
  if (tag === "equal") {
    return oldParagraphs.slice(i1, i2).map(equalRecord);
  }
  if (tag === "delete") {
    return oldParagraphs.slice(i1, i2).map(deletedRecord);
  }
  if (tag === "insert") {
    return newParagraphs.slice(j1, j2).map(addedRecord);
  }
  return refineReplacedSpan(
    oldParagraphs.slice(i1, i2).join(PARAGRAPH_DELIMITER),
    newParagraphs.slice(j1, j2).join(PARAGRAPH_DELIMITER),
    threshold,
  );
};

/**
 * Paragraph-level alignment of two documents, with each replaced paragraph
 * span re-aligned once at sentence level. Records follow document order.
 */
export const align = (oldText: string, newText: string, options: AlignOptions = {}): DiffRecord[] => {
  const threshold = options.pairingThreshold ?? DEFAULT_PAIRING_THRESHOLD;
  const oldParagraphs = splitParagraphs(oldText);
  const newParagraphs = splitParagraphs(newText);

  return getOpcodes(oldParagraphs, newParagraphs).flatMap((opcode) =>
    recordsForParagraphOpcode(opcode, oldParagraphs, newParagraphs, threshold),
  );
};
