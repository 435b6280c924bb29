import { describe, expect, it } from "vitest";
import type { DiffRecord } from "../src/core/diff/schema.js";
import {
  ONLY_IN_NEW_PLACEHOLDER,
  ONLY_IN_OLD_PLACEHOLDER,
  buildSideView,
  isSide,
} from "../src/core/render/sideView.js";

const records: DiffRecord[] = [
  { type: "equal", oldContent: "Same.", newContent: "Same." },
  { type: "deleted", oldContent: "Gone.", newContent: "" },
  { type: "added", oldContent: "", newContent: "New." },
  { type: "modified", oldContent: "a.", newContent: "b." },
  { type: "modified", oldContent: "c.", newContent: "d." },
];

describe("buildSideView", () => {
  it("shows old content with a placeholder for additions", () => {
    expect(buildSideView(records, "old")).toEqual([
      { type: "equal", text: "Same.", placeholder: false },
      { type: "deleted", text: "Gone.", placeholder: false, anchorId: "old-deletion-1" },
      { type: "added", text: ONLY_IN_NEW_PLACEHOLDER, placeholder: true },
      { type: "modified", text: "a.", placeholder: false, anchorId: "old-modification-1" },
      { type: "modified", text: "c.", placeholder: false, anchorId: "old-modification-2" },
    ]);
  });

  it("shows new content with a placeholder for deletions", () => {
    expect(buildSideView(records, "new")).toEqual([
      { type: "equal", text: "Same.", placeholder: false },
      { type: "deleted", text: ONLY_IN_OLD_PLACEHOLDER, placeholder: true },
      { type: "added", text: "New.", placeholder: false, anchorId: "new-addition-1" },
      { type: "modified", text: "b.", placeholder: false, anchorId: "new-modification-1" },
      { type: "modified", text: "d.", placeholder: false, anchorId: "new-modification-2" },
    ]);
  });

  it("restarts anchor numbering on every call", () => {
    buildSideView(records, "new");
    expect(buildSideView(records, "new")[2]?.anchorId).toBe("new-addition-1");
  });
});

describe("isSide", () => {
  it("accepts only old and new", () => {
    expect(isSide("old")).toBe(true);
    expect(isSide("new")).toBe(true);
    expect(isSide("left")).toBe(false);
  });
});
