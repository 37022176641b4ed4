import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import ExcelJS from "exceljs";
import type { Workbook, Worksheet } from "exceljs";
import { logger } from "../logger.js";
import type { RunSummary } from "../types/scrape.js";

export interface ExportOptions {
  outputPath: string;
  /** Append `_YYYYMMDD_HHMMSS` to the file name. */
  timestamp?: boolean;
  now?: Date;
}

export interface ExportResult {
  filePath: string;
  products: number;
  errors: number;
}

const MAX_COLUMN_WIDTH = 50;

export const PRODUCT_COLUMNS = [
  { header: "Product Name", key: "name" },
  { header: "Price", key: "price" },
  { header: "Currency", key: "currency" },
  { header: "Availability", key: "availability" },
  { header: "Rating", key: "rating" },
  { header: "Product URL", key: "url" },
  { header: "Image URL", key: "imageUrl" },
  { header: "Page", key: "pageNumber" },
  { header: "Scraped At", key: "scrapedAt" },
] as const;

export const ERROR_COLUMNS = [
  { header: "Page", key: "pageNumber" },
  { header: "Reason", key: "reason" },
  { header: "Message", key: "message" },
  { header: "Status Code", key: "statusCode" },
  { header: "Attempts", key: "attempts" },
] as const;

const pad = (value: number) => String(value).padStart(2, "0");

export const formatFileTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const resolveOutputPath = (
  outputPath: string,
  timestamp: boolean,
  now: Date,
): string => {
  const base = outputPath.replace(/\.xlsx$/i, "");
  return timestamp ? `${base}_${formatFileTimestamp(now)}.xlsx` : `${base}.xlsx`;
};

const fitColumnWidths = (sheet: Worksheet) => {
  sheet.columns.forEach((column) => {
    let longest = 0;
    column.eachCell?.({ includeEmpty: false }, (cell) => {
      longest = Math.max(longest, cell.text.length);
    });
    column.width = Math.min(longest + 2, MAX_COLUMN_WIDTH);
  });
};

export const buildWorkbook = (summary: RunSummary): Workbook => {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date(summary.finishedAt);

  const products = workbook.addWorksheet("Products");
  products.columns = PRODUCT_COLUMNS.map((column) => ({ ...column }));
  for (const record of summary.records) {
    products.addRow({
      name: record.name,
      price: record.price,
      currency: record.currency ?? null,
      availability: record.availability,
      rating: record.rating ?? null,
      url: record.url ?? null,
      imageUrl: record.imageUrl ?? null,
      pageNumber: record.pageNumber,
      scrapedAt: record.scrapedAt,
    });
  }
  products.getColumn("price").numFmt = "0.00";
  products.getRow(1).font = { bold: true };
  fitColumnWidths(products);

  if (summary.errors.length > 0) {
    const errors = workbook.addWorksheet("Errors");
    errors.columns = ERROR_COLUMNS.map((column) => ({ ...column }));
    for (const error of summary.errors) {
      errors.addRow({
        pageNumber: error.pageNumber,
        reason: error.reason,
        message: error.message,
        statusCode: error.statusCode ?? null,
        attempts: error.attempts ?? null,
      });
    }
    errors.getRow(1).font = { bold: true };
    fitColumnWidths(errors);
  }

  return workbook;
};

/**
 * Write the run's records (and its error list, when there is one) to an xlsx
 * file. A run without records writes nothing and returns `null`.
 */
export const exportWorkbook = async (
  summary: RunSummary,
  options: ExportOptions,
): Promise<ExportResult | null> => {
  if (summary.records.length === 0) {
    logger.warn("No records to export", {
      outputPath: options.outputPath,
      errors: summary.errors.length,
    });
    return null;
  }

  const filePath = resolveOutputPath(
    options.outputPath,
    options.timestamp ?? false,
    options.now ?? new Date(),
  );

  await mkdir(dirname(filePath), { recursive: true });
  await buildWorkbook(summary).xlsx.writeFile(filePath);

  logger.info("Exported records", {
    filePath,
    products: summary.records.length,
    errors: summary.errors.length,
  });

  return {
    filePath,
    products: summary.records.length,
    errors: summary.errors.length,
  };
};
