/**
 * stratum CLI
 *
 * Commands:
 *   ingest   - Index a document or a directory of documents
 *   images   - Index a folder of images
 *   query    - Hybrid / hierarchical search
 *   delete   - Remove every record of one source
 *   list     - List indexed sources
 *   stats    - Collection statistics
 *   rebuild  - Rebuild the keyword index from stored records
 *
 * Exit codes:
 *   0 - Success
 *   1 - Invalid arguments
 *   2 - Ingestion finished with failures
 *   3 - Execution failed
 */

import { loadConfig, type StratumConfig } from "./utils/config.js";
import { ValidationError, formatErrorForUser, getRecoveryHint, isRecoverableError } from "./utils/errors.js";
import { getLogger } from "./utils/logger.js";
import { KnowledgeBase, type KnowledgeBaseOptions, type QueryOptions } from "./rag/knowledgeBase.js";
import type { ContentType, QueryResult } from "./rag/types.js";

export const EXIT_SUCCESS = 0;
export const EXIT_INVALID_ARGS = 1;
export const EXIT_INGEST_FAILED = 2;
export const EXIT_EXECUTION_FAILED = 3;

const PREVIEW_LENGTH = 200;

export type CliCommand =
  | { command: "ingest"; file?: string; dir?: string; recursive: boolean; maxChunkSize?: number }
  | { command: "images"; dir: string; recursive: boolean; batchSize?: number }
  | { command: "query"; text: string; options: QueryOptions; json: boolean }
  | { command: "delete"; path: string }
  | { command: "list" }
  | { command: "stats" }
  | { command: "rebuild" }
  | { command: "help" };

export type ParsedArgs = { ok: true; value: CliCommand; debug: boolean } | { ok: false; error: string };

export const HELP_TEXT = `Usage: stratum <command> [options]

Commands:
  ingest --file <path> | --dir <dir> [--no-recursive] [--max-chunk-size <n>]
  images --dir <dir> [--batch-size <n>] [--no-recursive]
  query <text> [--topk <n>] [--alpha <x>] [--no-hierarchical] [--no-parent]
               [--no-children] [--siblings] [--content-type text|image]
               [--filter <expr>] [--json]
  delete <path>
  list
  stats
  rebuild
  help

Global options:
  --debug    Verbose logging`;

function parsePositiveInt(flag: string, raw: string | undefined): number | string {
  const value = raw === undefined ? NaN : Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    return `${flag} expects a positive integer, got "${raw ?? ""}"`;
  }
  return value;
}

/**
 * Parse argv (without the node executable and script path).
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const debug = argv.includes("--debug");
  const args = argv.filter((arg) => arg !== "--debug");
  const [command, ...rest] = args;

  const fail = (error: string): ParsedArgs => ({ ok: false, error });
  const ok = (value: CliCommand): ParsedArgs => ({ ok: true, value, debug });

  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return ok({ command: "help" });

    case "ingest": {
      const parsed: { file?: string; dir?: string; recursive: boolean; maxChunkSize?: number } = { recursive: true };
      for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (arg === "--file" && rest[i + 1]) {
          parsed.file = rest[++i];
        } else if (arg === "--dir" && rest[i + 1]) {
          parsed.dir = rest[++i];
        } else if (arg === "--no-recursive") {
          parsed.recursive = false;
        } else if (arg === "--max-chunk-size") {
          const size = parsePositiveInt(arg, rest[++i]);
          if (typeof size === "string") return fail(size);
          parsed.maxChunkSize = size;
        } else {
          return fail(`Unknown option for ingest: ${arg ?? ""}`);
        }
      }
      if (!parsed.file === !parsed.dir) {
        return fail("ingest needs exactly one of --file or --dir");
      }
      return ok({ command: "ingest", ...parsed });
    }

    case "images": {
      let dir: string | undefined;
      let recursive = true;
      let batchSize: number | undefined;
      for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (arg === "--dir" && rest[i + 1]) {
          dir = rest[++i];
        } else if (arg === "--no-recursive") {
          recursive = false;
        } else if (arg === "--batch-size") {
          const size = parsePositiveInt(arg, rest[++i]);
          if (typeof size === "string") return fail(size);
          batchSize = size;
        } else {
          return fail(`Unknown option for images: ${arg ?? ""}`);
        }
      }
      if (!dir) return fail("images needs --dir");
      return ok(batchSize === undefined ? { command: "images", dir, recursive } : { command: "images", dir, recursive, batchSize });
    }

    case "query": {
      const words: string[] = [];
      const options: QueryOptions = {};
      let json = false;
      for (let i = 0; i < rest.length; i++) {
        const arg = rest[i] ?? "";
        if (arg === "--topk") {
          const topK = parsePositiveInt(arg, rest[++i]);
          if (typeof topK === "string") return fail(topK);
          options.topK = topK;
        } else if (arg === "--alpha") {
          const raw = rest[++i];
          const alpha = raw === undefined ? NaN : Number(raw);
          if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
            return fail(`--alpha expects a number in [0, 1], got "${raw ?? ""}"`);
          }
          options.alpha = alpha;
        } else if (arg === "--no-hierarchical") {
          options.hierarchical = false;
        } else if (arg === "--no-parent") {
          options.includeParent = false;
        } else if (arg === "--no-children") {
          options.includeChildren = false;
        } else if (arg === "--siblings") {
          options.includeSiblings = true;
        } else if (arg === "--content-type") {
          const raw = rest[++i];
          if (raw !== "text" && raw !== "image") {
            return fail(`--content-type expects text or image, got "${raw ?? ""}"`);
          }
          const contentType: ContentType = raw;
          options.contentType = contentType;
        } else if (arg === "--filter" && rest[i + 1]) {
          options.filterExpression = rest[++i];
        } else if (arg === "--json") {
          json = true;
        } else if (arg.startsWith("--")) {
          return fail(`Unknown option for query: ${arg}`);
        } else {
          words.push(arg);
        }
      }
      const text = words.join(" ").trim();
      if (!text) return fail("query needs search text");
      return ok({ command: "query", text, options, json });
    }

    case "delete": {
      const [target, extra] = rest;
      if (!target || extra !== undefined) return fail("delete needs exactly one path");
      return ok({ command: "delete", path: target });
    }

    case "list":
    case "stats":
    case "rebuild":
      if (rest.length > 0) return fail(`${command} takes no arguments`);
      return ok({ command });

    default:
      return fail(`Unknown command: ${command}`);
  }
}

function preview(content: string): string {
  const flat = content.replace(/\s+/g, " ").trim();
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH)}...` : flat;
}

export function formatResult(result: QueryResult, rank: number): string {
  const header = `${rank}. [${result.score.toFixed(4)}] ${result.role} ${result.chunkType} ${result.key}`;
  return `${header}\n   ${preview(result.content)}`;
}

export const RETRY_NOTE = "This may be temporary; try the command again.";

/**
 * Text printed for a failed command. Plain errors get the hint their message
 * suggests; recoverable failures end with a retry note.
 */
export function describeError(error: unknown, debug: boolean): string {
  let message = formatErrorForUser(error, debug ? "detailed" : "medium");
  const hint = getRecoveryHint(error);
  if (hint && !message.includes(`Hint: ${hint}`)) {
    message += `\n\nHint: ${hint}`;
  }
  if (isRecoverableError(error)) {
    message += `\n${RETRY_NOTE}`;
  }
  return message;
}

async function execute(command: Exclude<CliCommand, { command: "help" }>, kb: KnowledgeBase): Promise<number> {
  switch (command.command) {
    case "ingest": {
      if (command.file) {
        const result = await kb.addDocument(command.file);
        if (result.success) {
          console.log(`✓ ${result.filePath}: ${result.message}`);
          return EXIT_SUCCESS;
        }
        console.error(`✗ ${result.filePath}: ${result.message}${result.error ? ` (${result.error})` : ""}`);
        return EXIT_INGEST_FAILED;
      }

      const batch = await kb.addDirectory(command.dir ?? ".", { recursive: command.recursive }, (done, total, result) => {
        const mark = result.success ? "✓" : "✗";
        console.log(`[${done}/${total}] ${mark} ${result.filePath}: ${result.message}`);
      });
      console.log(`Indexed ${batch.succeeded} of ${batch.total} documents`);
      return batch.failed > 0 ? EXIT_INGEST_FAILED : EXIT_SUCCESS;
    }

    case "images": {
      const result = await kb.addImageFolder(
        command.dir,
        command.batchSize === undefined ? { recursive: command.recursive } : { recursive: command.recursive, batchSize: command.batchSize }
      );
      const line = `${result.folderPath}: ${result.message}${result.error ? ` (${result.error})` : ""}`;
      if (result.success && result.failedCount === 0) {
        console.log(`✓ ${line}`);
        return EXIT_SUCCESS;
      }
      console.error(`✗ ${line}`);
      return EXIT_INGEST_FAILED;
    }

    case "query": {
      const results = await kb.query(command.text, command.options);
      if (command.json) {
        console.log(JSON.stringify(results, null, 2));
      } else if (results.length === 0) {
        console.log("No results.");
      } else {
        console.log(results.map((result, i) => formatResult(result, i + 1)).join("\n"));
      }
      return EXIT_SUCCESS;
    }

    case "delete": {
      const result = await kb.deleteDocument(command.path);
      if (result.error) {
        console.error(`✗ ${result.filePath}: ${result.message} (${result.error})`);
        return EXIT_EXECUTION_FAILED;
      }
      console.log(`${result.filePath}: ${result.message}`);
      return EXIT_SUCCESS;
    }

    case "list": {
      const sources = await kb.listDocuments();
      if (sources.length === 0) {
        console.log("No documents indexed.");
      }
      for (const source of sources) {
        console.log(`${source.filePath}\t${source.fileType}\t${source.records} records\t${source.createdAt}`);
      }
      return EXIT_SUCCESS;
    }

    case "stats": {
      const stats = await kb.getStats();
      console.log(JSON.stringify(stats, null, 2));
      return EXIT_SUCCESS;
    }

    case "rebuild": {
      const size = await kb.rebuildHybridIndex();
      console.log(`Keyword index rebuilt: ${size} chunks`);
      return EXIT_SUCCESS;
    }
  }
}

/**
 * Run one CLI invocation and return its exit code.
 *
 * @param overrides - encoder/database replacements (tests)
 */
export async function runCli(
  argv: readonly string[],
  overrides: Omit<KnowledgeBaseOptions, "config"> & { config?: StratumConfig } = {}
): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    console.error(`Error: ${parsed.error}`);
    console.error(HELP_TEXT);
    return EXIT_INVALID_ARGS;
  }

  const command = parsed.value;
  if (command.command === "help") {
    console.log(HELP_TEXT);
    return EXIT_SUCCESS;
  }

  const logger = getLogger();
  let kb: KnowledgeBase;
  try {
    const config = overrides.config ?? (await loadConfig());
    if (parsed.debug || config.logging.debug) {
      logger.setDebugMode(true);
    }
    if (config.logging.logToFile) {
      await logger.setLogToFile(true);
    }
    const chunking = command.command === "ingest" && command.maxChunkSize !== undefined
      ? { ...config.chunking, maxChunkSize: command.maxChunkSize }
      : config.chunking;
    kb = await KnowledgeBase.open({ ...overrides, config: { ...config, chunking } });
  } catch (error) {
    console.error(describeError(error, parsed.debug));
    return error instanceof ValidationError ? EXIT_INVALID_ARGS : EXIT_EXECUTION_FAILED;
  }

  try {
    return await execute(command, kb);
  } catch (error) {
    console.error(describeError(error, parsed.debug));
    return EXIT_EXECUTION_FAILED;
  } finally {
    await kb.close();
  }
}
