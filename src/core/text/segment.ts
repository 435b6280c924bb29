export const PARAGRAPH_DELIMITER = "\n\n";

const sentenceBoundary = /(?<=[.!?])\s+/;

export const splitParagraphs = (text: string): string[] =>
  text.split(PARAGRAPH_DELIMITER).filter((paragraph) => paragraph.trim().length > 0);

/**
 * Splits after `.`, `!` or `?` followed by whitespace. Abbreviations and
 * decimals followed by a space split too.
 */
export const splitSentences = (block: string): string[] =>
  block.split(sentenceBoundary).filter((sentence) => sentence.length > 0);

export const splitWords = (value: string): string[] =>
  value.split(/\s+/).filter((word) => word.length > 0);

export const countWords = (value: string): number => splitWords(value).length;
