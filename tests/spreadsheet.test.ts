import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import ExcelJS from "exceljs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  buildWorkbook,
  exportWorkbook,
  formatFileTimestamp,
  resolveOutputPath,
} from "../src/export/spreadsheet.js";
import type { ProductRecord, RunSummary } from "../src/types/scrape.js";

const NOW = new Date(2024, 0, 5, 9, 3, 7);

const attic: ProductRecord = {
  pageNumber: 1,
  position: 0,
  name: "A Light in the Attic",
  price: 51.77,
  currency: "GBP",
  availability: "in-stock",
  url: "https://shop.test/catalogue/a-light-in-the-attic_1000/index.html",
  rating: 3,
  imageUrl: "https://shop.test/media/cache/attic.jpg",
  scrapedAt: "2024-05-01T10:00:00.000Z",
};

const bare: ProductRecord = {
  pageNumber: 3,
  position: 1,
  name: "Sharp Objects",
  price: 47.82,
  availability: "unknown",
  scrapedAt: "2024-05-01T10:00:01.000Z",
};

const buildSummary = (overrides: Partial<RunSummary> = {}): RunSummary => ({
  pagesAttempted: 3,
  pagesFetched: 2,
  pagesSucceeded: 2,
  pagesFailed: 1,
  records: [attic, bare],
  errors: [
    {
      pageNumber: 2,
      reason: "http-error",
      message: "HTTP 500 Internal Server Error",
      statusCode: 500,
      attempts: 3,
    },
  ],
  startedAt: "2024-05-01T10:00:00.000Z",
  finishedAt: "2024-05-01T10:00:02.000Z",
  durationMs: 2_000,
  ...overrides,
});

describe("output naming", () => {
  it("formats a sortable local timestamp", () => {
    expect(formatFileTimestamp(NOW)).toBe("20240105_090307");
  });

  it("adds the timestamp before the extension", () => {
    expect(resolveOutputPath("out/products.xlsx", true, NOW)).toBe(
      "out/products_20240105_090307.xlsx",
    );
    expect(resolveOutputPath("report", false, NOW)).toBe("report.xlsx");
  });
});

describe("buildWorkbook", () => {
  it("fits column widths to the longest cell, capped at 50", () => {
    const sheet = buildWorkbook(buildSummary()).getWorksheet("Products");

    expect(sheet?.getColumn(1).width).toBe(22);
    expect(sheet?.getColumn(6).width).toBe(50);
  });

  it("omits the Errors sheet when the run had no errors", () => {
    const workbook = buildWorkbook(buildSummary({ errors: [] }));

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(["Products"]);
  });
});

describe("exportWorkbook", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "shelf-export-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes products and errors to separate sheets", async () => {
    const result = await exportWorkbook(buildSummary(), {
      outputPath: join(directory, "books.xlsx"),
      timestamp: true,
      now: NOW,
    });

    const filePath = join(directory, "books_20240105_090307.xlsx");
    expect(result).toEqual({ filePath, products: 2, errors: 1 });

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);

    const products = workbook.getWorksheet("Products");
    expect(products?.getRow(1).getCell(1).value).toBe("Product Name");
    expect(products?.getRow(1).getCell(9).value).toBe("Scraped At");
    expect(products?.getRow(2).getCell(1).value).toBe("A Light in the Attic");
    expect(products?.getRow(2).getCell(2).value).toBe(51.77);
    expect(products?.getRow(2).getCell(3).value).toBe("GBP");
    expect(products?.getRow(2).getCell(5).value).toBe(3);
    expect(products?.getRow(3).getCell(1).value).toBe("Sharp Objects");
    expect(products?.getRow(3).getCell(3).value).toBeNull();
    expect(products?.getRow(3).getCell(8).value).toBe(3);

    const errors = workbook.getWorksheet("Errors");
    expect(errors?.getRow(1).getCell(2).value).toBe("Reason");
    expect(errors?.getRow(2).getCell(1).value).toBe(2);
    expect(errors?.getRow(2).getCell(2).value).toBe("http-error");
    expect(errors?.getRow(2).getCell(4).value).toBe(500);
    expect(errors?.getRow(2).getCell(5).value).toBe(3);
  });

  it("creates missing parent directories", async () => {
    const result = await exportWorkbook(buildSummary(), {
      outputPath: join(directory, "nested", "run.xlsx"),
    });

    expect(result?.filePath).toBe(join(directory, "nested", "run.xlsx"));
    expect(await readdir(join(directory, "nested"))).toEqual(["run.xlsx"]);
  });

  it("writes nothing when there are no records", async () => {
    const result = await exportWorkbook(buildSummary({ records: [] }), {
      outputPath: join(directory, "empty.xlsx"),
    });

    expect(result).toBeNull();
    expect(await readdir(directory)).toEqual([]);
  });
});
