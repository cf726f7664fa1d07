/**
 * Parser selection by file extension
 */

import path from "node:path";
import { ErrorCode, ValidationError } from "../../utils/errors.js";
import type { FileType } from "../types.js";
import { DocxParser } from "./docx.js";
import { MarkdownParser } from "./markdown.js";
import type { DocumentParser } from "./types.js";

export type { DocumentBlock, DocumentParser, ParsedDocument } from "./types.js";
export { DocxParser, htmlToBlocks, decodeEntities } from "./docx.js";
export { MarkdownParser, parseMarkdownBlocks } from "./markdown.js";

const PARSERS: readonly DocumentParser[] = [new DocxParser(), new MarkdownParser()];

export const SUPPORTED_DOCUMENT_EXTENSIONS: readonly string[] = PARSERS.flatMap((parser) => [...parser.extensions]);

export function isSupportedDocument(filePath: string): boolean {
  return SUPPORTED_DOCUMENT_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

/**
 * @param fileType - force a parser regardless of extension
 * @throws {ValidationError} VALIDATION_UNSUPPORTED_FILE
 */
export function getParserForPath(filePath: string, fileType?: FileType): DocumentParser {
  const extension = path.extname(filePath).toLowerCase();
  const parser = fileType
    ? PARSERS.find((candidate) => candidate.fileType === fileType)
    : PARSERS.find((candidate) => candidate.extensions.includes(extension));

  if (!parser) {
    throw new ValidationError(
      ErrorCode.VALIDATION_UNSUPPORTED_FILE,
      `Unsupported file type: ${fileType ?? (extension || "(no extension)")}`,
      { field: "filePath", value: filePath }
    );
  }
  return parser;
}
