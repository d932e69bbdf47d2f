import { ConfigError } from "../errors";
import type { Chunk, Document } from "../types";

/** Measures a piece of text; defaults to its character count. */
export type LengthFunction = (text: string) => number;

export interface ChunkOptions {
  /** Maximum measure of one window. */
  chunkSize: number;
  /** Measure shared by two successive windows. Must be < chunkSize. */
  chunkOverlap: number;
  /** Optional measure (e.g. a token counter). Must be monotonic in text length. */
  lengthFunction?: LengthFunction;
}

// Code points, so a surrogate pair counts once.
const charLength: LengthFunction = (text) => Array.from(text).length;

/**
 * Validate chunk parameters. Overlap >= size would never make forward
 * progress, so it is rejected outright.
 *
 * @throws {ConfigError}
 */
export function assertChunkOptions(chunkSize: number, chunkOverlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigError(`chunkSize must be a positive integer (got ${chunkSize}).`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigError(`chunkOverlap must be a non-negative integer (got ${chunkOverlap}).`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigError(
      `chunkOverlap (=${chunkOverlap}) must be smaller than chunkSize (=${chunkSize}).`,
    );
  }
}

/**
 * Split text into overlapping fixed-size windows. Every window is non-empty
 * and measures at most `chunkSize`; each window starts inside the previous
 * one so that the shared tail measures at most `chunkOverlap`; the last
 * window ends at the end of the text. Text measuring ≤ chunkSize yields
 * exactly one window, empty text yields none.
 *
 * With the default character measure this is the classic sliding window:
 * start += chunkSize - chunkOverlap until a window reaches the end.
 */
export function splitText(text: string, options: ChunkOptions): Chunk[] {
  const { chunkSize, chunkOverlap } = options;
  assertChunkOptions(chunkSize, chunkOverlap);
  const measure = options.lengthFunction ?? charLength;

  const out: Chunk[] = [];
  if (text.length === 0) return out;

  // Windows are cut on code point boundaries; bounds[i] is the UTF-16 offset of code point i.
  const bounds = codePointBounds(text);
  const points = bounds.length - 1;
  const slice: Slicer = (from, to) => text.slice(bounds[from], bounds[to]);

  let start = 0;
  for (;;) {
    const end = windowEnd(slice, points, start, chunkSize, measure);
    out.push({
      text: slice(start, end),
      index: out.length,
      offset: bounds[start],
      metadata: { chunkIndex: out.length },
    });
    if (end >= points) break;
    start = overlapStart(slice, start, end, chunkOverlap, measure);
  }
  return out;
}

/**
 * Split a loaded document; each chunk inherits the document metadata.
 */
export function splitDocument(doc: Document, options: ChunkOptions): Chunk[] {
  return splitText(doc.text, options).map((c) => ({
    ...c,
    metadata: { ...doc.metadata, chunkIndex: c.index },
  }));
}

type Slicer = (from: number, to: number) => string;

function codePointBounds(text: string): number[] {
  const bounds = [0];
  let at = 0;
  for (const ch of text) {
    at += ch.length;
    bounds.push(at);
  }
  return bounds;
}

// Largest end in (start, points] with measure(slice(start, end)) <= size; at least start + 1.
function windowEnd(slice: Slicer, points: number, start: number, size: number, measure: LengthFunction): number {
  if (measure === charLength) return Math.min(points, start + size);
  let lo = start + 1;
  let hi = points;
  if (measure(slice(start, hi)) <= size) return hi;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (measure(slice(start, mid)) <= size) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

// Smallest next start in (start, end] whose tail slice(next, end) measures <= overlap.
function overlapStart(slice: Slicer, start: number, end: number, overlap: number, measure: LengthFunction): number {
  if (measure === charLength) return Math.max(start + 1, end - overlap);
  let lo = start + 1;
  let hi = end;
  while (lo < hi) {
    const mid = Math.floor((lo + hi) / 2);
    if (measure(slice(mid, end)) <= overlap) hi = mid;
    else lo = mid + 1;
  }
  return lo;
}
