import path from "path";
import mammoth from "mammoth";
import { errorMessage, ExtractionError } from "../errors/errors";
import { cleanDocumentText } from "../normalizer/text.cleaner";
import { DocumentKind, isSupportedExtension, KIND_BY_EXTENSION } from "./document.kinds";
import { parsePdfBuffer } from "./pdf.parser";

export type { DocumentKind } from "./document.kinds";

export interface DocumentFile {
  fileName: string;
  bytes: Buffer;
}

export interface ExtractedDocument {
  kind: DocumentKind;
  title: string;
  rawText: string;
}

export interface DocumentExtractor {
  extract(file: DocumentFile): Promise<ExtractedDocument>;
  clean(rawText: string): string;
}

export function detectDocumentKind(fileName: string): DocumentKind | undefined {
  const extension = path.extname(fileName).toLowerCase().replace(".", "");
  return isSupportedExtension(extension) ? KIND_BY_EXTENSION[extension] : undefined;
}

function baseTitle(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}

async function extractDocx(bytes: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: bytes });
  return result.value ?? "";
}

async function extractRaw(
  kind: DocumentKind,
  file: DocumentFile
): Promise<{ title: string; rawText: string }> {
  switch (kind) {
    case "pdf":
      return parsePdfBuffer(file.bytes, baseTitle(file.fileName));
    case "docx":
      return { title: baseTitle(file.fileName), rawText: await extractDocx(file.bytes) };
    case "text":
      return { title: baseTitle(file.fileName), rawText: file.bytes.toString("utf8") };
  }
}

export async function extractDocument(file: DocumentFile): Promise<ExtractedDocument> {
  const kind = detectDocumentKind(file.fileName);
  if (!kind) {
    const extension = path.extname(file.fileName) || "(none)";
    throw new ExtractionError(
      "unsupported_format",
      `Unsupported file format: ${extension}`
    );
  }

  let extracted: { title: string; rawText: string };
  try {
    extracted = await extractRaw(kind, file);
  } catch (error) {
    throw new ExtractionError(
      "parse_failure",
      `Failed to extract text from ${kind.toUpperCase()} document "${file.fileName}": ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (extracted.rawText.trim().length === 0) {
    throw new ExtractionError(
      "parse_failure",
      `No text could be extracted from "${file.fileName}"`
    );
  }

  return { kind, ...extracted };
}

export const documentExtractor: DocumentExtractor = {
  extract: extractDocument,
  clean: cleanDocumentText,
};
