/**
 * Word (.docx) → structural blocks
 *
 * mammoth converts the document to semantic HTML (headings, paragraphs,
 * lists, tables), which is then walked tag by tag in document order.
 */

import fs from "node:fs/promises";
import path from "node:path";
import * as mammoth from "mammoth";
import { ErrorCode, FileSystemError, ValidationError, isErrnoException } from "../../utils/errors.js";
import { scopedLogger } from "../../utils/logger.js";
import type { DocumentBlock, DocumentParser, ParsedDocument } from "./types.js";

const logger = scopedLogger("docx");

const TOKEN_PATTERN = /<(\/?)([a-z][a-z0-9]*)\b[^>]*>|([^<]+)/gi;
const BLOCK_TAGS = new Set(["h1", "h2", "h3", "h4", "h5", "h6", "p", "pre", "li"]);

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: "\"",
  apos: "'",
  nbsp: " ",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return String.fromCodePoint(parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith("#")) {
      return String.fromCodePoint(parseInt(entity.slice(1), 10));
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

type Frame =
  | { kind: "block"; tag: string; text: string }
  | { kind: "cell"; text: string }
  | { kind: "table"; rows: string[]; row: string[] | null };

type TableFrame = Extract<Frame, { kind: "table" }>;

function toBlock(tag: string, raw: string): DocumentBlock | null {
  const text = raw.trim();
  if (!text) return null;
  if (tag === "pre") return { kind: "code", text };
  if (tag.startsWith("h")) return { kind: "heading", level: Number(tag.slice(1)), text };
  return { kind: "paragraph", text };
}

/**
 * Read mammoth's HTML output into blocks by walking its tags with a stack.
 *
 * Every list item becomes its own paragraph at any nesting depth; text an
 * item holds before a nested list is emitted ahead of the nested items.
 * Paragraphs inside table cells join the cell text, and a table nested in a
 * cell is flattened into that cell.
 */
export function htmlToBlocks(html: string): DocumentBlock[] {
  const blocks: DocumentBlock[] = [];
  const stack: Frame[] = [];

  const top = (): Frame | undefined => stack[stack.length - 1];
  const nearestTable = (): TableFrame | undefined => {
    for (let i = stack.length - 1; i >= 0; i--) {
      const frame = stack[i];
      if (frame?.kind === "table") return frame;
    }
    return undefined;
  };
  const emit = (tag: string, text: string) => {
    const block = toBlock(tag, text);
    if (block) blocks.push(block);
  };

  for (const match of html.matchAll(TOKEN_PATTERN)) {
    const [, slash, rawName, text] = match;
    const current = top();

    if (text !== undefined) {
      if (current && current.kind !== "table") {
        current.text += decodeEntities(text);
      }
      continue;
    }

    const name = (rawName ?? "").toLowerCase();
    const closing = slash === "/";

    if (!closing) {
      if (name === "br") {
        if (current && current.kind !== "table") current.text += "\n";
      } else if (name === "table") {
        stack.push({ kind: "table", rows: [], row: null });
      } else if (name === "tr") {
        const table = nearestTable();
        if (table) table.row = [];
      } else if (name === "td" || name === "th") {
        stack.push({ kind: "cell", text: "" });
      } else if (BLOCK_TAGS.has(name)) {
        if (current?.kind === "cell" || (current?.kind === "block" && current.tag === "li" && name !== "li")) {
          // Flows into the enclosing cell or list item
          if (current.text.trim()) current.text += "\n";
        } else {
          if (current?.kind === "block") {
            emit(current.tag, current.text);
            current.text = "";
          }
          stack.push({ kind: "block", tag: name, text: "" });
        }
      }
      continue;
    }

    if (BLOCK_TAGS.has(name)) {
      if (current?.kind === "block" && current.tag === name) {
        stack.pop();
        emit(current.tag, current.text);
      }
    } else if (name === "td" || name === "th") {
      if (current?.kind === "cell") {
        stack.pop();
        nearestTable()?.row?.push(current.text.replace(/\s*\n\s*/g, " ").trim());
      }
    } else if (name === "tr") {
      const table = nearestTable();
      if (table?.row) {
        if (table.row.some((cell) => cell)) table.rows.push(table.row.join(" | "));
        table.row = null;
      }
    } else if (name === "table" && current?.kind === "table") {
      stack.pop();
      const tableText = current.rows.join("\n");
      const outer = top();
      if (outer?.kind === "cell") {
        outer.text += `${outer.text.trim() ? "\n" : ""}${tableText}`;
      } else if (tableText) {
        blocks.push({ kind: "table", text: tableText });
      }
    }
  }

  return blocks;
}

export class DocxParser implements DocumentParser {
  readonly fileType = "word" as const;
  readonly extensions = [".docx"] as const;

  async parse(filePath: string): Promise<ParsedDocument> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw isErrnoException(error) ? FileSystemError.fromNodeError(error, filePath, "read") : error;
    }

    let html: string;
    try {
      const result = await mammoth.convertToHtml({ buffer });
      html = result.value;
      for (const message of result.messages) {
        logger.debug(`mammoth ${message.type}: ${message.message}`);
      }
    } catch (error) {
      throw new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, `Not a readable .docx file: ${filePath}`, {
        cause: error instanceof Error ? error : undefined,
        value: filePath,
      });
    }

    return {
      filePath,
      fileType: this.fileType,
      title: path.parse(filePath).name,
      blocks: htmlToBlocks(html),
    };
  }
}
