/**
 * Document loader: bytes + declared type → raw text + origin metadata.
 *
 * Parsers are imported lazily so that plain-text ingestion (and the test
 * suite) never pays for loading the PDF / DOCX stacks.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { DocumentParseError, UnsupportedFormatError, errorMessage } from "../errors";
import type { Document, DocumentFormat } from "../types";

export const SUPPORTED_FORMATS: readonly DocumentFormat[] = ["pdf", "docx", "doc", "txt"];

/** Narrow an arbitrary declared type (extension, with or without dot) to a supported format. */
export function parseFormat(declaredType: string): DocumentFormat | null {
  const t = declaredType.trim().toLowerCase().replace(/^\./, "");
  return SUPPORTED_FORMATS.find((f) => f === t) ?? null;
}

/** Extension of a file name without the dot ("" when there is none). */
export function formatOf(fileName: string): string {
  return path.extname(fileName).slice(1).toLowerCase();
}

// Line endings are normalized so chunk boundaries do not depend on the platform that wrote the file.
function normalize(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

async function extractPdf(bytes: Uint8Array): Promise<{ text: string; pageCount: number }> {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data: bytes });
  try {
    const textResult = await parser.getText();
    return { text: textResult.text || "", pageCount: textResult.pages.length };
  } finally {
    await parser.destroy();
  }
}

async function extractDocx(bytes: Uint8Array): Promise<string> {
  const { extractRawText } = await import("mammoth");
  const result = await extractRawText({ buffer: Buffer.from(bytes) });
  return result.value;
}

interface Extracted {
  text: string;
  pageCount?: number;
}

async function extractText(bytes: Uint8Array, fileType: DocumentFormat): Promise<Extracted> {
  switch (fileType) {
    case "pdf":
      return extractPdf(bytes);
    case "docx":
    case "doc":
      return { text: await extractDocx(bytes) };
    case "txt":
      return { text: Buffer.from(bytes).toString("utf8") };
  }
}

/**
 * Extract text from an uploaded file's bytes.
 *
 * @param bytes Raw file content.
 * @param declaredType Declared format ("pdf", "docx", "doc", "txt"; a leading dot is tolerated).
 * @param name Original file name, stored as `metadata.source`.
 * @throws {UnsupportedFormatError} For any other declared type.
 * @throws {DocumentParseError} When the PDF or Word parser rejects the content.
 */
export async function loadDocument(
  bytes: Uint8Array,
  declaredType: string,
  name: string,
): Promise<Document> {
  const fileType = parseFormat(declaredType);
  if (!fileType) throw new UnsupportedFormatError(declaredType);

  let extracted: Extracted;
  try {
    extracted = await extractText(bytes, fileType);
  } catch (e) {
    console.error(`[RAG] Failed to parse ${name}: ${errorMessage(e)}`);
    throw new DocumentParseError(name, fileType, { cause: e });
  }
  const { text, pageCount } = extracted;
  return {
    text: normalize(text),
    metadata: { source: name, fileType, ...(pageCount === undefined ? {} : { pageCount }) },
  };
}

/**
 * Read a file from disk and load it, declaring its type from the extension.
 * The format is checked before the file is read.
 */
export async function loadDocumentFile(absPath: string): Promise<Document> {
  const declared = formatOf(absPath);
  if (!parseFormat(declared)) throw new UnsupportedFormatError(declared);
  const bytes = await fs.readFile(absPath);
  return loadDocument(bytes, declared, path.basename(absPath));
}
