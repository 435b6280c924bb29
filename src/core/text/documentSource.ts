import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { PARAGRAPH_DELIMITER } from "./segment.js";

export type DocumentSourceErrorCode = "unreadable" | "empty" | "too-large";

export class DocumentSourceError extends Error {
  public constructor(
    public readonly code: DocumentSourceErrorCode,
    public readonly source: string,
    message: string,
  ) {
    super(message);
    this.name = "DocumentSourceError";
  }
}

export interface LoadedDocument {
  name: string;
  path: string;
  text: string;
}

/**
 * Blank lines separate paragraphs; any other whitespace run, line breaks
 * included, becomes a single space.
 */
export const normalizeText = (raw: string): string =>
  raw
    .replace(/\r\n?/g, "\n")
    .split(/\n[^\S\n]*\n\s*/)
    .map((paragraph) => paragraph.replace(/\s+/g, " ").trim())
    .filter((paragraph) => paragraph.length > 0)
    .join(PARAGRAPH_DELIMITER);

export const assertWithinLimit = (text: string, source: string, maxInputChars: number): void => {
  if (text.length > maxInputChars) {
    throw new DocumentSourceError(
      "too-large",
      source,
      `${source} has ${text.length} characters, more than the limit of ${maxInputChars}`,
    );
  }
};

export const loadDocument = async (path: string, maxInputChars: number): Promise<LoadedDocument> => {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DocumentSourceError("unreadable", path, `Cannot read ${path}: ${reason}`);
  }

  const text = normalizeText(raw);
  if (text.length === 0) {
    throw new DocumentSourceError("empty", path, `No text found in ${path}`);
  }
  assertWithinLimit(text, path, maxInputChars);
  return { name: basename(path), path, text };
};
