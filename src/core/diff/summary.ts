import type { DiffRecord, Summary } from "./schema.js";
import { countWords } from "../text/segment.js";

const percentageOf = (count: number, total: number): number => (total > 0 ? (count / total) * 100 : 0);

export const summarize = (records: readonly DiffRecord[]): Summary => {
  let added = 0;
  let deleted = 0;
  let modified = 0;
  let unchanged = 0;
  let addedWords = 0;
  let deletedWords = 0;
  let modifiedWordsOld = 0;
  let modifiedWordsNew = 0;

  for (const record of records) {
    switch (record.type) {
      case "added":
        added += 1;
        addedWords += countWords(record.newContent);
        break;
      case "deleted":
        deleted += 1;
        deletedWords += countWords(record.oldContent);
        break;
      case "modified":
        modified += 1;
        modifiedWordsOld += countWords(record.oldContent);
        modifiedWordsNew += countWords(record.newContent);
        break;
      case "equal":
        unchanged += 1;
        break;
    }
  }

  const totalElements = added + deleted + modified + unchanged;

  return Object.freeze({
    totalElements,
    additions: Object.freeze({ count: added, percentage: percentageOf(added, totalElements), words: addedWords }),
    deletions: Object.freeze({ count: deleted, percentage: percentageOf(deleted, totalElements), words: deletedWords }),
    modifications: Object.freeze({
      count: modified,
      percentage: percentageOf(modified, totalElements),
      wordsOld: modifiedWordsOld,
      wordsNew: modifiedWordsNew,
    }),
    unchanged: Object.freeze({ count: unchanged, percentage: percentageOf(unchanged, totalElements) }),
  });
};
