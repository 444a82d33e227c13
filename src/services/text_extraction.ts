import path from "path";
import mammoth from "mammoth";
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { InvalidFileError, UnsupportedFileTypeError, getErrorMessage } from "../utils/errors.js";
import { SUPPORTED_DOCUMENT_EXTENSIONS } from "../utils/constants.js";

export interface ExtractedText {
  text: string;
  source: "pdf" | "docx" | "txt";
  pageCount?: number;
  pdfVersion?: string;
}

type SupportedExtension = (typeof SUPPORTED_DOCUMENT_EXTENSIONS)[number];

export function fileExtension(filename: string): string {
  return path.extname(filename).toLowerCase();
}

export function isSupportedDocument(filename: string): boolean {
  const ext = fileExtension(filename);
  return SUPPORTED_DOCUMENT_EXTENSIONS.some((supported) => supported === ext);
}

async function extractPdf(buffer: Buffer): Promise<ExtractedText> {
  const result = await pdfParse(buffer);
  const info: unknown = result.info;
  return {
    text: result.text,
    source: "pdf",
    pageCount: result.numpages,
    pdfVersion:
      typeof info === "object" && info !== null && "PDFFormatVersion" in info &&
      typeof info.PDFFormatVersion === "string"
        ? info.PDFFormatVersion
        : undefined,
  };
}

async function extractDocx(buffer: Buffer): Promise<ExtractedText> {
  const result = await mammoth.extractRawText({ buffer });
  return { text: result.value, source: "docx" };
}

const extractors: Record<SupportedExtension, (buffer: Buffer) => Promise<ExtractedText>> = {
  ".pdf": extractPdf,
  ".docx": extractDocx,
  ".txt": async (buffer) => ({ text: buffer.toString("utf8"), source: "txt" }),
};

/**
 * Pulls plain text out of an uploaded file, picking the parser by extension.
 *
 * @throws UnsupportedFileTypeError for anything but .pdf, .docx and .txt
 * @throws InvalidFileError when the parser rejects the bytes
 */
export async function extractText(buffer: Buffer, filename: string): Promise<ExtractedText> {
  const ext = fileExtension(filename);
  const supported = SUPPORTED_DOCUMENT_EXTENSIONS.find((candidate) => candidate === ext);
  if (!supported) {
    throw new UnsupportedFileTypeError(`Unsupported file type: ${filename}`);
  }

  try {
    return await extractors[supported](buffer);
  } catch (error) {
    throw new InvalidFileError(`Could not read ${filename}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}
