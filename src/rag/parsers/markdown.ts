/**
 * Markdown → structural blocks
 *
 * - YAML frontmatter stripped (gray-matter); `title` used when present
 * - ATX headings (# .. ######)
 * - Fenced code blocks (``` or ~~~), fences kept
 * - Pipe tables flattened to `cell | cell` rows, separator rows dropped
 * - Paragraphs end at blank lines and before any other block
 */

import fs from "node:fs/promises";
import path from "node:path";
import matter from "gray-matter";
import { FileSystemError, isErrnoException } from "../../utils/errors.js";
import type { DocumentBlock, DocumentParser, ParsedDocument } from "./types.js";

const HEADING_PATTERN = /^(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;
const FENCE_PATTERN = /^(`{3,}|~{3,})\s*([\w+-]*)/;
const TABLE_SEPARATOR_PATTERN = /^\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)*\|?$/;

function tableRow(line: string): string {
  return line
    .replace(/^\|/, "")
    .replace(/\|$/, "")
    .split("|")
    .map((cell) => cell.trim())
    .join(" | ");
}

export function parseMarkdownBlocks(markdown: string): DocumentBlock[] {
  const blocks: DocumentBlock[] = [];
  const lines = markdown.split(/\r?\n/);
  let paragraph: string[] = [];
  let tableRows: string[] = [];

  const flushParagraph = () => {
    const text = paragraph.join("\n").trim();
    if (text) blocks.push({ kind: "paragraph", text });
    paragraph = [];
  };
  const flushTable = () => {
    if (tableRows.length > 0) blocks.push({ kind: "table", text: tableRows.join("\n") });
    tableRows = [];
  };
  const flushAll = () => {
    flushParagraph();
    flushTable();
  };

  for (let i = 0; i < lines.length; i++) {
    const rawLine = lines[i] ?? "";
    const line = rawLine.trim();

    const fence = FENCE_PATTERN.exec(line);
    if (fence) {
      flushAll();
      const marker = fence[1] ?? "```";
      const language = fence[2] || undefined;
      const codeLines = [line];
      i++;
      while (i < lines.length && !(lines[i] ?? "").trim().startsWith(marker)) {
        codeLines.push(lines[i] ?? "");
        i++;
      }
      if (i < lines.length) {
        codeLines.push((lines[i] ?? "").trim());
      }
      blocks.push(language ? { kind: "code", text: codeLines.join("\n"), language } : { kind: "code", text: codeLines.join("\n") });
      continue;
    }

    const heading = HEADING_PATTERN.exec(line);
    if (heading) {
      flushAll();
      const hashes = heading[1] ?? "#";
      blocks.push({ kind: "heading", level: hashes.length, text: (heading[2] ?? "").trim() });
      continue;
    }

    if (line.startsWith("|")) {
      flushParagraph();
      if (!TABLE_SEPARATOR_PATTERN.test(line)) {
        tableRows.push(tableRow(line));
      }
      continue;
    }

    if (!line) {
      flushAll();
      continue;
    }

    flushTable();
    paragraph.push(line);
  }
  flushAll();

  return blocks;
}

export class MarkdownParser implements DocumentParser {
  readonly fileType = "markdown" as const;
  readonly extensions = [".md", ".markdown"] as const;

  async parse(filePath: string): Promise<ParsedDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw isErrnoException(error) ? FileSystemError.fromNodeError(error, filePath, "read") : error;
    }

    const { data, content } = matter(raw);
    const title = typeof data.title === "string" && data.title.trim()
      ? data.title.trim()
      : path.parse(filePath).name;

    return {
      filePath,
      fileType: this.fileType,
      title,
      blocks: parseMarkdownBlocks(content),
    };
  }
}
