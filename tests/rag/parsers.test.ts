import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "node:fs/promises";
import path from "node:path";
import {
  DocxParser,
  MarkdownParser,
  decodeEntities,
  getParserForPath,
  htmlToBlocks,
  isSupportedDocument,
  parseMarkdownBlocks,
} from "../../src/rag/parsers/index.js";
import { ErrorCode, FileSystemError, ValidationError } from "../../src/utils/errors.js";
import { makeTempDir, removeDir } from "../setup.js";

describe("parseMarkdownBlocks", () => {
  it("reads headings, paragraphs, fences and tables in order", () => {
    const markdown = [
      "# Title ##",
      "",
      "First line",
      "second line",
      "",
      "```rust",
      "fn main() {}",
      "",
      "```",
      "| Name | Age |",
      "|------|:---:|",
      "| Ann  | 30  |",
      "### Deep",
      "Closing paragraph",
    ].join("\n");

    expect(parseMarkdownBlocks(markdown)).toEqual([
      { kind: "heading", level: 1, text: "Title" },
      { kind: "paragraph", text: "First line\nsecond line" },
      { kind: "code", text: "```rust\nfn main() {}\n\n```", language: "rust" },
      { kind: "table", text: "Name | Age\nAnn | 30" },
      { kind: "heading", level: 3, text: "Deep" },
      { kind: "paragraph", text: "Closing paragraph" },
    ]);
  });

  it("keeps an unterminated fence to the end of the document", () => {
    expect(parseMarkdownBlocks("~~~\ncode\nmore")).toEqual([{ kind: "code", text: "~~~\ncode\nmore" }]);
  });

  it("does not treat #hashtags as headings", () => {
    expect(parseMarkdownBlocks("#tag is not a heading")).toEqual([{ kind: "paragraph", text: "#tag is not a heading" }]);
  });
});

describe("htmlToBlocks", () => {
  it("maps mammoth HTML to blocks", () => {
    const html = [
      "<h1>Report</h1>",
      "<p>Sales &amp; revenue<br />grew by &#37;5</p>",
      "<ul><li>North</li><li><strong>South</strong></li></ul>",
      "<table><tr><td><p>Region</p></td><td><p>Total</p></td></tr><tr><td></td><td></td></tr><tr><td>East</td><td>12</td></tr></table>",
      "<h3>Notes</h3>",
      "<p></p>",
    ].join("");

    expect(htmlToBlocks(html)).toEqual([
      { kind: "heading", level: 1, text: "Report" },
      { kind: "paragraph", text: "Sales & revenue\ngrew by %5" },
      { kind: "paragraph", text: "North" },
      { kind: "paragraph", text: "South" },
      { kind: "table", text: "Region | Total\nEast | 12" },
      { kind: "heading", level: 3, text: "Notes" },
    ]);
  });

  it("emits every item of nested lists in document order", () => {
    expect(htmlToBlocks("<ul><li>One<ul><li>Nested</li></ul></li><li>Two</li></ul>")).toEqual([
      { kind: "paragraph", text: "One" },
      { kind: "paragraph", text: "Nested" },
      { kind: "paragraph", text: "Two" },
    ]);
    expect(htmlToBlocks("<ol><li>Lead<ol><li>Inner <em>deep</em></li></ol>tail</li></ol>")).toEqual([
      { kind: "paragraph", text: "Lead" },
      { kind: "paragraph", text: "Inner deep" },
      { kind: "paragraph", text: "tail" },
    ]);
  });

  it("flattens a table nested in a cell into that cell", () => {
    const html =
      "<table><tr><td><p>Outer</p><table><tr><td>a</td><td>b</td></tr></table></td><td>x</td></tr></table>" +
      "<p>After</p>";
    expect(htmlToBlocks(html)).toEqual([
      { kind: "table", text: "Outer a | b | x" },
      { kind: "paragraph", text: "After" },
    ]);
  });

  it("decodes named and numeric entities", () => {
    expect(decodeEntities("&lt;a&gt; &quot;b&quot; &#x41;&#66; &unknown;")).toBe("<a> \"b\" AB &unknown;");
  });
});

describe("getParserForPath", () => {
  it("selects by extension, ignoring case", () => {
    expect(getParserForPath("/x/report.DOCX")).toBeInstanceOf(DocxParser);
    expect(getParserForPath("/x/notes.md").fileType).toBe("markdown");
    expect(getParserForPath("/x/notes.markdown").fileType).toBe("markdown");
    expect(isSupportedDocument("/x/a.txt")).toBe(false);
  });

  it("honors an explicit file type", () => {
    expect(getParserForPath("/x/notes.txt", "markdown")).toBeInstanceOf(MarkdownParser);
  });

  it("rejects unsupported files", () => {
    try {
      getParserForPath("/x/slides.pptx");
      throw new Error("expected a ValidationError");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: ErrorCode.VALIDATION_UNSUPPORTED_FILE, message: "Unsupported file type: .pptx" });
    }
  });
});

describe("file parsers", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("takes the markdown title from frontmatter", async () => {
    const filePath = path.join(dir, "page.md");
    await fs.writeFile(filePath, "---\ntitle: Field Guide\ntags: [a]\n---\n# Birds\n\nSparrows.\n", "utf-8");

    const parsed = await new MarkdownParser().parse(filePath);
    expect(parsed).toEqual({
      filePath,
      fileType: "markdown",
      title: "Field Guide",
      blocks: [
        { kind: "heading", level: 1, text: "Birds" },
        { kind: "paragraph", text: "Sparrows." },
      ],
    });
  });

  it("falls back to the file name for the title", async () => {
    const filePath = path.join(dir, "plain-notes.md");
    await fs.writeFile(filePath, "Just text.", "utf-8");
    expect((await new MarkdownParser().parse(filePath)).title).toBe("plain-notes");
  });

  it("reports a missing file as a file system error", async () => {
    const missing = path.join(dir, "gone.md");
    await expect(new MarkdownParser().parse(missing)).rejects.toMatchObject({
      code: ErrorCode.FS_FILE_NOT_FOUND,
      path: missing,
    });
    await expect(new DocxParser().parse(path.join(dir, "gone.docx"))).rejects.toBeInstanceOf(FileSystemError);
  });

  it("rejects a file that is not a docx archive", async () => {
    const filePath = path.join(dir, "fake.docx");
    await fs.writeFile(filePath, "plain text pretending to be a document", "utf-8");
    await expect(new DocxParser().parse(filePath)).rejects.toMatchObject({
      code: ErrorCode.VALIDATION_INVALID_FORMAT,
    });
  });
});
