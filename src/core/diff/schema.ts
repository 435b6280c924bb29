export type DiffRecordType = "equal" | "added" | "deleted" | "modified";

export interface DiffRecord {
  type: DiffRecordType;
  oldContent: string;
  newContent: string;
}

export interface ChangeStats {
  count: number;
  percentage: number;
}

export interface Summary {
  readonly totalElements: number;
  readonly additions: Readonly<ChangeStats & { words: number }>;
  readonly deletions: Readonly<ChangeStats & { words: number }>;
  readonly modifications: Readonly<ChangeStats & { wordsOld: number; wordsNew: number }>;
  readonly unchanged: Readonly<ChangeStats>;
}

export interface Comparison {
  id: string;
  oldName: string;
  newName: string;
  createdAt: string;
  records: DiffRecord[];
  summary: Summary;
}
