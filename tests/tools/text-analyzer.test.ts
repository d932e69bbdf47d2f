import { describe, expect, it } from "vitest";
import { analyzeText, formatTextStatistics, textAnalyzerTool } from "../../src/tools/text-analyzer";

describe("analyzeText", () => {
  it("computes basic statistics", () => {
    expect(analyzeText("A simple test. Another sentence!")).toEqual({
      wordCount: 5,
      charCount: 32,
      charCountNoSpaces: 28,
      sentenceCount: 2,
      paragraphCount: 1,
      readingTimeMinutes: 1,
      topWords: [
        { word: "simple", count: 1 },
        { word: "test", count: 1 },
        { word: "another", count: 1 },
        { word: "sentence", count: 1 },
      ],
    });
  });

  it("ranks frequent words, breaking ties by first occurrence", () => {
    const { topWords } = analyzeText("beta alpha Alpha gamma beta delta alpha");
    expect(topWords).toEqual([
      { word: "alpha", count: 3 },
      { word: "beta", count: 2 },
      { word: "gamma", count: 1 },
      { word: "delta", count: 1 },
    ]);
  });

  it("keeps only the top five words", () => {
    const { topWords } = analyzeText("aaaa bbbb cccc dddd eeee ffff");
    expect(topWords.map((w) => w.word)).toEqual(["aaaa", "bbbb", "cccc", "dddd", "eeee"]);
  });

  it("counts paragraphs separated by blank lines and runs of punctuation as one sentence", () => {
    const stats = analyzeText("First para...\n\nSecond para?!\n\n\n\nThird.");
    expect(stats.paragraphCount).toBe(3);
    expect(stats.sentenceCount).toBe(3);
  });

  it("counts characters, not UTF-16 units", () => {
    const stats = analyzeText("I \u2764 \u{1F600}");
    expect(stats.charCount).toBe(5);
    expect(stats.charCountNoSpaces).toBe(3);
  });

  it("measures keyword length in characters", () => {
    const bold = "\u{1D41A}\u{1D41B}\u{1D41C}";
    expect(analyzeText(`${bold} ${bold} word`).topWords).toEqual([{ word: "word", count: 1 }]);
  });

  it("rounds reading time up to whole minutes", () => {
    expect(analyzeText("word ".repeat(200)).readingTimeMinutes).toBe(1);
    expect(analyzeText("word ".repeat(201)).readingTimeMinutes).toBe(2);
  });

  it("handles empty text", () => {
    expect(analyzeText("")).toEqual({
      wordCount: 0,
      charCount: 0,
      charCountNoSpaces: 0,
      sentenceCount: 0,
      paragraphCount: 0,
      readingTimeMinutes: 0,
      topWords: [],
    });
  });
});

describe("text analyzer tool", () => {
  it("formats the report", async () => {
    const report = await textAnalyzerTool.run("A simple test. Another sentence!");
    expect(report).toBe(
      [
        "Text Analysis Results:",
        "- Word count: 5",
        "- Character count: 32",
        "- Character count (no spaces): 28",
        "- Sentence count: 2",
        "- Paragraph count: 1",
        "- Estimated reading time: 1 minute(s)",
        "",
        "Top 5 most frequent words:",
        "- simple: 1 times",
        "- test: 1 times",
        "- another: 1 times",
        "- sentence: 1 times",
      ].join("\n"),
    );
  });

  it("matches formatTextStatistics", () => {
    const stats = analyzeText("hello world");
    expect(formatTextStatistics(stats).split("\n").slice(-2)).toEqual(["- hello: 1 times", "- world: 1 times"]);
  });
});
