import type { DiffRecord, DiffRecordType } from "../diff/schema.js";

export type Side = "old" | "new";

export interface SideSegment {
  type: DiffRecordType;
  text: string;
  placeholder: boolean;
  anchorId?: string;
}

export const ONLY_IN_NEW_PLACEHOLDER = "[Content only in second document]";
export const ONLY_IN_OLD_PLACEHOLDER = "[Content only in first document]";

const anchorNames: Record<Exclude<DiffRecordType, "equal">, string> = {
  added: "addition",
  deleted: "deletion",
  modified: "modification",
};

export const isSide = (value: string): value is Side => value === "old" || value === "new";

export const buildSideView = (records: readonly DiffRecord[], side: Side): SideSegment[] => {
  const counters: Record<Exclude<DiffRecordType, "equal">, number> = { added: 0, deleted: 0, modified: 0 };

  return records.map((record): SideSegment => {
    const hiddenType = side === "old" ? "added" : "deleted";
    if (record.type === hiddenType) {
      return {
        type: record.type,
        text: side === "old" ? ONLY_IN_NEW_PLACEHOLDER : ONLY_IN_OLD_PLACEHOLDER,
        placeholder: true,
      };
    }

    const text = side === "old" ? record.oldContent : record.newContent;
    if (record.type === "equal") {
      return { type: record.type, text, placeholder: false };
    }
    counters[record.type] += 1;
    return {
      type: record.type,
      text,
      placeholder: false,
      anchorId: `${side}-${anchorNames[record.type]}-${counters[record.type]}`,
    };
  });
};
