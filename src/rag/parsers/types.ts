/**
 * Structural blocks produced by document parsers and consumed by the chunk tree builder
 */

import type { FileType } from "../types.js";

export type DocumentBlock =
  | { kind: "heading"; text: string; level: number }
  | { kind: "paragraph"; text: string }
  /** Table already flattened to row-joined text */
  | { kind: "table"; text: string }
  /** Fenced code block, fences included */
  | { kind: "code"; text: string; language?: string };

export interface ParsedDocument {
  filePath: string;
  fileType: FileType;
  title: string;
  blocks: DocumentBlock[];
}

/**
 * One implementation per supported format, selected by file extension
 */
export interface DocumentParser {
  readonly fileType: FileType;
  /** Lower-case extensions including the dot */
  readonly extensions: readonly string[];
  parse(filePath: string): Promise<ParsedDocument>;
}
