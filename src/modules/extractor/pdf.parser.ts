import { PDFParse } from "pdf-parse";

export interface ParsedPdfDocument {
  title: string;
  rawText: string;
}

function inferTitle(rawText: string, fallback?: string): string {
  if (fallback && fallback.trim().length > 0) return fallback.trim();
  const firstLine = rawText
    .split("\n")
    .map((line) => line.trim())
    .find(Boolean);
  return firstLine || "PDF document";
}

export async function parsePdfBuffer(
  pdfBuffer: Buffer,
  fallbackTitle?: string
): Promise<ParsedPdfDocument> {
  const parser = new PDFParse({ data: new Uint8Array(pdfBuffer) });

  let rawText = "";
  let title = fallbackTitle;
  try {
    const textResult = await parser.getText();
    rawText =
      textResult.text ||
      textResult.pages.map((page) => page.text).join("\n\n");

    const infoResult = await parser.getInfo().catch(() => undefined);
    // Metadata is missing in many PDFs; the text is still usable without it.
    const docTitle: unknown = infoResult?.info?.Title;
    if (typeof docTitle === "string" && docTitle.trim().length > 0) {
      title = docTitle;
    }
  } finally {
    await parser.destroy();
  }

  return {
    title: inferTitle(rawText, title),
    rawText,
  };
}
