import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ConverterParams } from "@indexflow/types";

const mockGetText = vi.fn();
const mockDestroy = vi.fn();

vi.mock("pdf-parse", () => ({
  PDFParse: class {
    getText(): Promise<unknown> {
      return mockGetText();
    }
    destroy(): Promise<void> {
      mockDestroy();
      return Promise.resolve();
    }
  },
}));

import { TextConverter } from "./text-converter.js";
import { PdfConverter } from "./pdf-converter.js";
import { MarkdownConverter, htmlToText } from "./markdown-converter.js";
import { removeNumericTables, isNumericTableRow } from "./numeric-tables.js";
import { createConverter } from "./factory.js";

const params: ConverterParams = { removeNumericTables: false, removeCodeSnippets: true };
const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("removeNumericTables", () => {
  it("detects rows dominated by numbers", () => {
    expect(isNumericTableRow("2021 2022 2023 total")).toBe(true);
    expect(isNumericTableRow("Revenue 10 20")).toBe(true);
  });

  it("keeps prose lines ending with a full stop", () => {
    expect(isNumericTableRow("In 2021 we sold 40 units.")).toBe(false);
  });

  it("keeps lines with few numbers and empty lines", () => {
    expect(isNumericTableRow("Chapter 1 introduces the topic")).toBe(false);
    expect(isNumericTableRow("")).toBe(false);
  });

  it("drops only the table rows", () => {
    const text = "Quarterly results\n10 20 30 40\nQ1 15 Q2 25\nThe end.";
    expect(removeNumericTables(text)).toBe("Quarterly results\nThe end.");
  });
});

describe("TextConverter", () => {
  const converter = new TextConverter();

  it("has kind 'text'", () => {
    expect(converter.kind).toBe("text");
  });

  it("decodes UTF-8 text", async () => {
    const result = await converter.convert(encode("Grüße aus Köln"), params);
    expect(result.text).toBe("Grüße aus Köln");
    expect(result.pageCount).toBe(1);
    expect(result.metadata).toEqual({ charCount: 14 });
  });

  it("counts form-feed separated pages", async () => {
    const result = await converter.convert(encode("one\ftwo\fthree"), params);
    expect(result.pageCount).toBe(3);
  });

  it("removes numeric tables when asked", async () => {
    const result = await converter.convert(encode("Header\n1 2 3\nFooter"), {
      ...params,
      removeNumericTables: true,
    });
    expect(result.text).toBe("Header\nFooter");
  });
});

describe("PdfConverter", () => {
  const converter = new PdfConverter();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("joins pages with form feeds", async () => {
    mockGetText.mockResolvedValueOnce({
      text: "Page one\n\nPage two",
      total: 2,
      pages: [
        { num: 1, text: "Page one" },
        { num: 2, text: "Page two" },
      ],
    });

    const result = await converter.convert(encode("%PDF-1.4"), params);

    expect(result.text).toBe("Page one\fPage two");
    expect(result.pageCount).toBe(2);
    expect(mockDestroy).toHaveBeenCalledOnce();
  });

  it("falls back to the full text when no pages are reported", async () => {
    mockGetText.mockResolvedValueOnce({ text: "Only text", total: 1, pages: [] });

    const result = await converter.convert(encode("%PDF-1.4"), params);
    expect(result.text).toBe("Only text");
  });

  it("removes numeric tables on every page", async () => {
    mockGetText.mockResolvedValueOnce({
      text: "",
      total: 2,
      pages: [
        { num: 1, text: "Intro\n1 2 3" },
        { num: 2, text: "4 5 6\nOutro" },
      ],
    });

    const result = await converter.convert(encode("%PDF-1.4"), { ...params, removeNumericTables: true });
    expect(result.text).toBe("Intro\fOutro");
  });

  it("releases the parser when extraction fails", async () => {
    mockGetText.mockRejectedValueOnce(new Error("Invalid PDF structure"));

    await expect(converter.convert(encode("garbage"), params)).rejects.toThrow("Invalid PDF structure");
    expect(mockDestroy).toHaveBeenCalledOnce();
  });
});

describe("MarkdownConverter", () => {
  const converter = new MarkdownConverter();
  const markdown = [
    "# Title",
    "",
    "Some **bold** text & more.",
    "",
    "```js",
    "const x = 1;",
    "```",
    "",
    "- one",
    "- two",
  ].join("\n");

  it("strips markup and keeps the text", async () => {
    const result = await converter.convert(encode(markdown), params);
    const lines = result.text.split("\n");

    expect(lines[0]).toBe("Title");
    expect(lines).toContain("Some bold text & more.");
    expect(lines).toContain("one");
    expect(lines).toContain("two");
    expect(result.text).not.toContain("<");
  });

  it("removes fenced code by default", async () => {
    const result = await converter.convert(encode(markdown), params);
    expect(result.text).not.toContain("const x = 1;");
  });

  it("keeps fenced code when removeCodeSnippets is off", async () => {
    const result = await converter.convert(encode(markdown), { ...params, removeCodeSnippets: false });
    expect(result.text).toContain("const x = 1;");
  });
});

describe("htmlToText", () => {
  it("decodes entities after removing tags", () => {
    expect(htmlToText("<p>a &lt;b&gt; &amp;amp; &quot;c&quot; &#39;d&#39;</p>")).toBe(
      `a <b> &amp; "c" 'd'`,
    );
  });

  it("turns line breaks into newlines", () => {
    expect(htmlToText("<p>one<br>two</p>")).toBe("one\ntwo");
  });
});

describe("createConverter factory", () => {
  it("creates a converter per kind", () => {
    expect(createConverter("text")).toBeInstanceOf(TextConverter);
    expect(createConverter("pdf")).toBeInstanceOf(PdfConverter);
    expect(createConverter("markdown")).toBeInstanceOf(MarkdownConverter);
  });

  it("throws for unknown kinds", () => {
    expect(() => createConverter("docx" as "text")).toThrow("Unknown converter kind: docx");
  });
});
