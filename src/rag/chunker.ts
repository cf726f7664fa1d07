/**
 * Chunk Tree Builder
 *
 * Turns the ordered blocks of a parsed document into a rooted chunk tree:
 * document → section → subsection → paragraph.
 *
 * Features:
 * - Size-bounded paragraphs (sentence packing, then overlapping windows)
 * - Minimum-size filter for prose; tables and code blocks always kept
 * - Deterministic traversal-order indices
 */

import { ErrorCode, ValidationError } from "../utils/errors.js";
import { HierarchicalContent } from "./hierarchy.js";
import type { DocumentBlock, ParsedDocument } from "./parsers/types.js";
import type { Chunk, ChunkMetadata, ChunkType } from "./types.js";

export interface ChunkTreeOptions {
  /** Max paragraph chunk length (characters). Default: 500 */
  maxChunkSize: number;
  /** Prose blocks shorter than this (after trimming) are dropped. Default: 50 */
  minChunkSize: number;
  /** Overlap between forced windows (characters). Default: 50 */
  overlapSize: number;
}

export const DEFAULT_CHUNK_TREE_OPTIONS: ChunkTreeOptions = {
  maxChunkSize: 500,
  minChunkSize: 50,
  overlapSize: 50,
};

/** Headings at or above this level open a section */
const SECTION_MAX_LEVEL = 2;
/** Headings deeper than this are treated as paragraphs */
const SUBSECTION_MAX_LEVEL = 4;

// A run of non-terminators closed by terminators (Latin and CJK), or the unterminated tail
const SENTENCE_PATTERN = /[^。！？.!?]*[。！？.!?]+\s*|[^。！？.!?]+$/g;

export function validateChunkTreeOptions(options: ChunkTreeOptions): void {
  const { maxChunkSize, minChunkSize, overlapSize } = options;
  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, `maxChunkSize must be a positive integer, got ${maxChunkSize}`, {
      field: "maxChunkSize",
      value: maxChunkSize,
    });
  }
  if (!Number.isInteger(minChunkSize) || minChunkSize < 0) {
    throw new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, `minChunkSize must be a non-negative integer, got ${minChunkSize}`, {
      field: "minChunkSize",
      value: minChunkSize,
    });
  }
  if (!Number.isInteger(overlapSize) || overlapSize < 0 || overlapSize >= maxChunkSize) {
    throw new ValidationError(
      ErrorCode.VALIDATION_INVALID_FORMAT,
      `overlapSize must be an integer in [0, maxChunkSize), got ${overlapSize}`,
      { field: "overlapSize", value: overlapSize }
    );
  }
}

/**
 * Cut text into fixed windows of `maxChunkSize`, each starting
 * `maxChunkSize - overlapSize` after the previous one.
 *
 * Windows are returned untrimmed so consecutive windows share exactly
 * `overlapSize` characters; whitespace-only windows are skipped.
 */
export function splitIntoWindows(text: string, maxChunkSize: number, overlapSize: number): string[] {
  const step = maxChunkSize - overlapSize;
  const windows: string[] = [];

  for (let start = 0; start < text.length; start += step) {
    const window = text.slice(start, start + maxChunkSize);
    if (window.trim()) {
      windows.push(window);
    }
    if (start + maxChunkSize >= text.length) {
      break;
    }
  }

  return windows;
}

/**
 * Split text longer than `maxChunkSize` into pieces no longer than it.
 *
 * Sentences (terminator retained) are packed greedily; a sentence that alone
 * exceeds the limit is cut with {@link splitIntoWindows}.
 */
export function splitLongText(
  text: string,
  options: Pick<ChunkTreeOptions, "maxChunkSize" | "overlapSize"> = DEFAULT_CHUNK_TREE_OPTIONS
): string[] {
  const { maxChunkSize, overlapSize } = options;
  if (text.length <= maxChunkSize) {
    return [text];
  }

  const sentences = text.match(SENTENCE_PATTERN) ?? [text];
  const pieces: string[] = [];
  let current = "";

  const pushCurrent = () => {
    const trimmed = current.trim();
    if (trimmed) {
      pieces.push(trimmed);
    }
    current = "";
  };

  for (const sentence of sentences) {
    if (sentence.length > maxChunkSize) {
      pushCurrent();
      pieces.push(...splitIntoWindows(sentence, maxChunkSize, overlapSize));
      continue;
    }

    if (current.length + sentence.length <= maxChunkSize) {
      current += sentence;
    } else {
      pushCurrent();
      current = sentence;
    }
  }
  pushCurrent();

  return pieces;
}

interface DraftChunk {
  index: number;
  content: string;
  chunkType: ChunkType;
  level: number;
  parentId: number | null;
  childrenIds: number[];
  metadata: ChunkMetadata;
}

/**
 * Builds a {@link HierarchicalContent} from parser output.
 *
 * @example
 * const builder = new ChunkTreeBuilder({ maxChunkSize: 300 });
 * const tree = builder.build(await new MarkdownParser().parse("notes.md"));
 * tree.metadata.totalChunks;
 */
export class ChunkTreeBuilder {
  private readonly options: ChunkTreeOptions;

  constructor(options: Partial<ChunkTreeOptions> = {}) {
    this.options = { ...DEFAULT_CHUNK_TREE_OPTIONS, ...options };
    validateChunkTreeOptions(this.options);
  }

  getOptions(): Readonly<ChunkTreeOptions> {
    return this.options;
  }

  build(document: ParsedDocument): HierarchicalContent {
    const drafts: DraftChunk[] = [];

    const addChunk = (
      content: string,
      chunkType: ChunkType,
      parent: DraftChunk | null,
      level: number,
      metadata: ChunkMetadata = {}
    ): DraftChunk => {
      const chunk: DraftChunk = {
        index: drafts.length,
        content,
        chunkType,
        level,
        parentId: parent ? parent.index : null,
        childrenIds: [],
        metadata,
      };
      drafts.push(chunk);
      parent?.childrenIds.push(chunk.index);
      return chunk;
    };

    const root = addChunk(`Document: ${document.title}`, "document", null, 0, { filePath: document.filePath });
    let currentSection: DraftChunk | null = null;
    let currentSubsection: DraftChunk | null = null;
    let tableCount = 0;

    for (const block of document.blocks) {
      if (block.kind === "heading" && block.level <= SUBSECTION_MAX_LEVEL) {
        const text = block.text.trim();
        if (!text) continue;

        if (block.level <= SECTION_MAX_LEVEL) {
          currentSection = addChunk(text, "section", root, 1, { headingLevel: block.level });
          currentSubsection = null;
        } else {
          currentSubsection = addChunk(text, "subsection", currentSection ?? root, currentSection ? 2 : 1, {
            headingLevel: block.level,
          });
        }
        continue;
      }

      // Levels follow the chunk type, not tree depth: a paragraph under a
      // subsection is level 3 even when no section is open
      const parent = currentSubsection ?? currentSection ?? root;
      const level = currentSubsection ? 3 : currentSection ? 2 : 1;

      if (block.kind === "table") {
        const text = block.text.trim();
        if (!text) continue;
        addChunk(`[Table ${tableCount + 1}]\n${text}`, "paragraph", parent, level, { isTable: true, tableIndex: tableCount });
        tableCount++;
        continue;
      }

      if (block.kind === "code") {
        const text = block.text.trim();
        if (!text) continue;
        const metadata: ChunkMetadata = { isCode: true };
        if (block.language) {
          metadata.codeLanguage = block.language;
        }
        addChunk(text, "paragraph", parent, level, metadata);
        continue;
      }

      const text = block.text.trim();
      if (text.length < this.options.minChunkSize || !text) {
        continue;
      }

      const metadata = paragraphMetadata(block);
      for (const piece of splitLongText(text, this.options)) {
        addChunk(piece, "paragraph", parent, level, { ...metadata });
      }
    }

    const chunks: Chunk[] = drafts;
    return new HierarchicalContent(chunks, {
      filePath: document.filePath,
      fileType: document.fileType,
      title: document.title,
    });
  }
}

function paragraphMetadata(block: DocumentBlock): ChunkMetadata {
  // Deep headings become plain paragraphs but remember where they came from
  return block.kind === "heading" ? { headingLevel: block.level } : {};
}
