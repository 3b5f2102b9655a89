import { describe, it, expect } from "vitest";
import { cleanDocumentText } from "../modules/normalizer/text.cleaner";

describe("cleanDocumentText", () => {
  it("collapses line endings and whitespace into single spaces", () => {
    expect(cleanDocumentText("  Line one\r\nLine\ttwo\r\n\r\n  end  ")).toBe(
      "Line one Line two end"
    );
  });

  it("strips control and zero-width characters", () => {
    expect(cleanDocumentText("Mach\u0000ine lear\u200bning\u0007 model")).toBe(
      "Machine learning model"
    );
  });

  it("normalizes typographic quotes", () => {
    expect(cleanDocumentText("“AI system” isn’t")).toBe("\"AI system\" isn't");
  });

  it("returns an empty string for blank input", () => {
    expect(cleanDocumentText(" \n\t ")).toBe("");
  });
});
