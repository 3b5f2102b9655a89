// C0 and C1 control characters, except tab, line feed and carriage return,
// which are handled as whitespace.
const CONTROL_CHARS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f]/g;

// Soft hyphens and zero-width characters left behind by PDF text layers.
const INVISIBLE_CHARS = /[\u00ad\u200b-\u200d\u2060\ufeff]/g;

function normalizeQuotes(input: string): string {
  return input
    .replace(/[“”„‟«»]/g, "\"")
    .replace(/[‘’‚‛]/g, "'");
}

function normalizeLineEndings(input: string): string {
  return input.replace(/\r\n?/g, "\n");
}

/**
 * Normalizes extracted document text into a single line of prose:
 * line endings unified, control and invisible characters removed,
 * runs of whitespace collapsed to one space.
 */
export function cleanDocumentText(raw: string): string {
  if (!raw || raw.trim().length === 0) return "";

  return normalizeQuotes(normalizeLineEndings(raw))
    .replace(CONTROL_CHARS, "")
    .replace(INVISIBLE_CHARS, "")
    .replace(/\s+/g, " ")
    .trim();
}
