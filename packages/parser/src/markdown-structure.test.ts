import { describe, it, expect } from "vitest";
import {
  deriveTitle,
  extractTables,
  extractFigures,
  estimatePageCount,
  UNTITLED,
} from "./markdown-structure.js";

describe("deriveTitle", () => {
  it("uses the first markdown heading", () => {
    expect(deriveTitle("\n## Release Notes\n\nSome body text here.")).toBe("Release Notes");
  });

  it("falls back to the first eight words of a substantial line", () => {
    const text = "ok\nThe quick brown fox jumps over the lazy sleeping dog today";
    expect(deriveTitle(text)).toBe("The quick brown fox jumps over the lazy...");
  });

  it("does not add an ellipsis for short lines", () => {
    expect(deriveTitle("Field notes from spring")).toBe("Field notes from spring");
  });

  it("returns the untitled marker when nothing qualifies", () => {
    expect(deriveTitle("a\nbb\n\n")).toBe(UNTITLED);
  });
});

describe("extractTables", () => {
  it("reads header, rows and a preceding caption", () => {
    const markdown = [
      "Intro paragraph.",
      "",
      "Table 1: Yields",
      "| Crop | Tons |",
      "| --- | ---: |",
      "| Wheat | 12 |",
      "| Barley | 7 |",
      "",
      "After.",
    ].join("\n");

    expect(extractTables(markdown)).toEqual([
      {
        index: 0,
        caption: "Table 1: Yields",
        headers: ["Crop", "Tons"],
        rows: [
          ["Wheat", "12"],
          ["Barley", "7"],
        ],
      },
    ]);
  });

  it("ignores pipe lines without a separator row", () => {
    expect(extractTables("| not | a table |\n| still | not |")).toEqual([]);
  });

  it("numbers multiple tables in order", () => {
    const markdown = "| a |\n| - |\n| 1 |\n\ntext\n\n| b |\n| --- |\n| 2 |";
    const tables = extractTables(markdown);
    expect(tables.map((t) => [t.index, t.headers[0], t.caption])).toEqual([
      [0, "a", ""],
      [1, "b", ""],
    ]);
  });
});

describe("extractFigures", () => {
  it("reads markdown images", () => {
    expect(extractFigures('See ![Growth chart](img/growth.png "Growth") and ![](b.svg).')).toEqual([
      { index: 0, caption: "Growth chart", source: "img/growth.png" },
      { index: 1, caption: "", source: "b.svg" },
    ]);
  });

  it("reads img tags only for html sources", () => {
    const html = '<p>x</p><img alt="Logo" src="/logo.png"><img src="">';
    expect(extractFigures(html)).toEqual([]);
    expect(extractFigures(html, true)).toEqual([{ index: 0, caption: "Logo", source: "/logo.png" }]);
  });
});

describe("estimatePageCount", () => {
  it("estimates 3000 characters per page with a floor of one", () => {
    expect(estimatePageCount("x".repeat(9000))).toBe(3);
    expect(estimatePageCount("x".repeat(9001))).toBe(4);
    expect(estimatePageCount("")).toBe(1);
  });
});
