import { describe, expect, it } from "vitest";
import * as fc from "fast-check";
import { splitDocument, splitText } from "../../src/rag/chunker";
import { ConfigError } from "../../src/errors";

// True when the string has no unpaired surrogate.
function isWellFormed(text: string): boolean {
  return !/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/.test(text);
}

describe("splitText", () => {
  it("slides a fixed window with the requested overlap", () => {
    const chunks = splitText("abcdefghij", { chunkSize: 4, chunkOverlap: 1 });
    expect(chunks.map((c) => c.text)).toEqual(["abcd", "defg", "ghij"]);
    expect(chunks.map((c) => c.offset)).toEqual([0, 3, 6]);
    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2]);
    expect(chunks.map((c) => c.metadata.chunkIndex)).toEqual([0, 1, 2]);
  });

  it("returns a single chunk when the text fits", () => {
    const chunks = splitText("short text", { chunkSize: 1000, chunkOverlap: 200 });
    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe("short text");
  });

  it("returns no chunks for empty text", () => {
    expect(splitText("", { chunkSize: 10, chunkOverlap: 2 })).toEqual([]);
  });

  it("rejects overlap that is not smaller than the size", () => {
    expect(() => splitText("abc", { chunkSize: 5, chunkOverlap: 5 })).toThrow(ConfigError);
    expect(() => splitText("abc", { chunkSize: 5, chunkOverlap: 9 })).toThrow(ConfigError);
  });

  it("rejects non-positive sizes and negative overlap", () => {
    expect(() => splitText("abc", { chunkSize: 0, chunkOverlap: 0 })).toThrow(ConfigError);
    expect(() => splitText("abc", { chunkSize: 5, chunkOverlap: -1 })).toThrow(ConfigError);
    expect(() => splitText("abc", { chunkSize: 2.5, chunkOverlap: 0 })).toThrow(ConfigError);
  });

  it("honours a custom length measure", () => {
    // Every character measures 2, so size 4 / overlap 2 behaves like 2 / 1.
    const chunks = splitText("abcdef", { chunkSize: 4, chunkOverlap: 2, lengthFunction: (t) => 2 * t.length });
    expect(chunks.map((c) => c.text)).toEqual(["ab", "bc", "cd", "de", "ef"]);
  });

  it("covers the text with bounded, overlapping windows", () => {
    const params = fc
      .record({ size: fc.integer({ min: 1, max: 40 }), text: fc.string({ maxLength: 300 }) })
      .chain(({ size, text }) => fc.record({ size: fc.constant(size), text: fc.constant(text), overlap: fc.integer({ min: 0, max: size - 1 }) }));

    fc.assert(
      fc.property(params, ({ size, overlap, text }) => {
        const chunks = splitText(text, { chunkSize: size, chunkOverlap: overlap });
        if (text.length === 0) return chunks.length === 0;

        expect(chunks[0].offset).toBe(0);
        const last = chunks[chunks.length - 1];
        expect(last.offset + last.text.length).toBe(text.length);

        let rebuilt = chunks[0].text;
        for (let i = 0; i < chunks.length; i++) {
          const c = chunks[i];
          expect(c.text.length).toBeGreaterThan(0);
          expect(c.text.length).toBeLessThanOrEqual(size);
          expect(text.slice(c.offset, c.offset + c.text.length)).toBe(c.text);
          if (i > 0) {
            const prev = chunks[i - 1];
            const prevEnd = prev.offset + prev.text.length;
            expect(c.offset).toBeGreaterThan(prev.offset);
            expect(c.offset).toBeLessThanOrEqual(prevEnd);
            expect(prevEnd - c.offset).toBeLessThanOrEqual(overlap);
            rebuilt += c.text.slice(prevEnd - c.offset);
          }
        }
        expect(rebuilt).toBe(text);

        const expected = text.length <= size ? 1 : Math.ceil((text.length - overlap) / (size - overlap));
        expect(chunks).toHaveLength(expected);
        return true;
      }),
      { numRuns: 200 },
    );
  });

  it("measures characters, not UTF-16 units", () => {
    const chunks = splitText("abc\u{1F600}def", { chunkSize: 4, chunkOverlap: 0 });
    expect(chunks.map((c) => c.text)).toEqual(["abc\u{1F600}", "def"]);
    expect(chunks.map((c) => c.offset)).toEqual([0, 5]);
  });

  it("never splits a surrogate pair", () => {
    const params = fc
      .record({ size: fc.integer({ min: 1, max: 20 }), text: fc.fullUnicodeString({ maxLength: 120 }) })
      .chain(({ size, text }) => fc.record({ size: fc.constant(size), text: fc.constant(text), overlap: fc.integer({ min: 0, max: size - 1 }) }));

    fc.assert(
      fc.property(params, ({ size, overlap, text }) => {
        const chunks = splitText(text, { chunkSize: size, chunkOverlap: overlap });
        let rebuilt = "";
        let covered = 0;
        for (const c of chunks) {
          expect(isWellFormed(c.text)).toBe(true);
          expect(Array.from(c.text).length).toBeLessThanOrEqual(size);
          expect(text.slice(c.offset, c.offset + c.text.length)).toBe(c.text);
          rebuilt += c.text.slice(covered - c.offset);
          covered = c.offset + c.text.length;
        }
        expect(rebuilt).toBe(text);
        return true;
      }),
      { numRuns: 200 },
    );
  });

  it("is deterministic", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 200 }), (text) => {
        const opts = { chunkSize: 17, chunkOverlap: 5 };
        expect(splitText(text, opts)).toEqual(splitText(text, opts));
      }),
    );
  });
});

describe("splitDocument", () => {
  it("attaches document metadata and the chunk index", () => {
    const chunks = splitDocument(
      { text: "abcdefgh", metadata: { source: "notes.txt", fileType: "txt" } },
      { chunkSize: 4, chunkOverlap: 0 },
    );
    expect(chunks.map((c) => c.metadata)).toEqual([
      { source: "notes.txt", fileType: "txt", chunkIndex: 0 },
      { source: "notes.txt", fileType: "txt", chunkIndex: 1 },
    ]);
  });
});
