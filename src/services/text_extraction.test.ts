import { describe, it, expect } from "vitest";
import { extractText, fileExtension, isSupportedDocument } from "./text_extraction.js";
import { InvalidFileError, UnsupportedFileTypeError } from "../utils/errors.js";
import { buildDocx } from "../../test/support/docx.js";
import { buildPdf } from "../../test/support/pdf.js";

describe("text_extraction", () => {
  it("recognises supported extensions case-insensitively", () => {
    expect(fileExtension("Report.PDF")).toBe(".pdf");
    expect(isSupportedDocument("notes.TXT")).toBe(true);
    expect(isSupportedDocument("contract.docx")).toBe(true);
    expect(isSupportedDocument("sheet.xlsx")).toBe(false);
    expect(isSupportedDocument("README")).toBe(false);
  });

  it("reads plain text as UTF-8", async () => {
    const result = await extractText(Buffer.from("Grüße aus Köln", "utf8"), "greeting.txt");
    expect(result).toEqual({ text: "Grüße aus Köln", source: "txt" });
  });

  it("reads the raw text of a DOCX", async () => {
    const result = await extractText(buildDocx(["First paragraph", "Second paragraph"]), "memo.docx");

    expect(result.source).toBe("docx");
    expect(result.text.split(/\n+/).filter(Boolean)).toEqual(["First paragraph", "Second paragraph"]);
  });

  it("reads text, page count and version of a PDF", async () => {
    const result = await extractText(buildPdf("Quarterly revenue grew"), "report.pdf");

    expect(result.source).toBe("pdf");
    expect(result.text.trim()).toBe("Quarterly revenue grew");
    expect(result.pageCount).toBe(1);
    expect(result.pdfVersion).toBe("1.4");
  });

  it("refuses unsupported extensions", async () => {
    await expect(extractText(Buffer.from("# title"), "notes.md")).rejects.toThrow(
      new UnsupportedFileTypeError("Unsupported file type: notes.md")
    );
  });

  it("wraps parser failures as invalid files", async () => {
    const docx = extractText(Buffer.from("not a zip archive"), "broken.docx");
    await expect(docx).rejects.toBeInstanceOf(InvalidFileError);
    await expect(docx).rejects.toThrow(/^Could not read broken\.docx: /);

    await expect(extractText(Buffer.from("not a pdf"), "broken.pdf")).rejects.toBeInstanceOf(InvalidFileError);
  });
});
