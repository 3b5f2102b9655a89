export type DocumentKind = "pdf" | "docx" | "text";

export const KIND_BY_EXTENSION: Readonly<Record<string, DocumentKind>> = {
  pdf: "pdf",
  docx: "docx",
  txt: "text",
  md: "text",
};

/** Extensions the extractor can read, lowercase and without the dot. */
export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(KIND_BY_EXTENSION);

export function isSupportedExtension(extension: string): boolean {
  return Object.prototype.hasOwnProperty.call(KIND_BY_EXTENSION, extension);
}
