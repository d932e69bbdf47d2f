import { defineTool } from "./tool";

export interface TextStatistics {
  wordCount: number;
  charCount: number;
  charCountNoSpaces: number;
  sentenceCount: number;
  paragraphCount: number;
  /** Minutes at 200 words per minute, rounded up. */
  readingTimeMinutes: number;
  /** Most frequent words longer than 3 characters, ties in order of first occurrence. */
  topWords: Array<{ word: string; count: number }>;
}

const WORDS_PER_MINUTE = 200;
const TOP_WORDS = 5;
const MIN_KEYWORD_LENGTH = 4;

// Characters as code points, not UTF-16 units.
const charLength = (s: string): number => Array.from(s).length;

export function analyzeText(text: string): TextStatistics {
  const wordCount = text.split(/\s+/).filter(Boolean).length;
  const frequencies = new Map<string, number>();
  for (const [word] of text.toLowerCase().matchAll(/[\p{L}\p{N}_]+/gu)) {
    if (charLength(word) >= MIN_KEYWORD_LENGTH) frequencies.set(word, (frequencies.get(word) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so equal counts keep first-occurrence order.
  const topWords = [...frequencies]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_WORDS);

  return {
    wordCount,
    charCount: charLength(text),
    charCountNoSpaces: charLength(text.replaceAll(" ", "")),
    sentenceCount: text.match(/[.!?]+/g)?.length ?? 0,
    paragraphCount: text.split("\n\n").filter((p) => p.trim()).length,
    readingTimeMinutes: Math.ceil(wordCount / WORDS_PER_MINUTE),
    topWords,
  };
}

export function formatTextStatistics(stats: TextStatistics): string {
  const lines = [
    "Text Analysis Results:",
    `- Word count: ${stats.wordCount}`,
    `- Character count: ${stats.charCount}`,
    `- Character count (no spaces): ${stats.charCountNoSpaces}`,
    `- Sentence count: ${stats.sentenceCount}`,
    `- Paragraph count: ${stats.paragraphCount}`,
    `- Estimated reading time: ${stats.readingTimeMinutes} minute(s)`,
    "",
    `Top ${TOP_WORDS} most frequent words:`,
    ...stats.topWords.map(({ word, count }) => `- ${word}: ${count} times`),
  ];
  return lines.join("\n");
}

export const textAnalyzerTool = defineTool(
  "text_analyzer",
  "Useful for analyzing text content. Can count words, characters, sentences, find keywords, and provide basic text statistics. Input should be the text to analyze.",
  "Error analyzing text",
  (input) => formatTextStatistics(analyzeText(input)),
);
