import ExcelJS from "exceljs";
import type { CellValue } from "exceljs";
import { ShapeError } from "../errors.js";

/** Cell content with formatting, links and formulas resolved to a value */
export type SheetCell = string | number | Date | null;

export type Sheet = {
  name: string;
  /** Row-major, 0-indexed; blank rows are empty arrays */
  rows: SheetCell[][];
};

function toSheetCell(value: CellValue): SheetCell {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || value instanceof Date) return value;
  if (typeof value === "boolean") return String(value);
  if ("richText" in value) return value.richText.map((run) => run.text).join("");
  if ("hyperlink" in value) return value.text;
  if ("formula" in value || "sharedFormula" in value) return toSheetCell(value.result ?? null);
  // error cells ("#N/A")
  return null;
}

/**
 * Reads every worksheet of an XLSX workbook
 */
export async function readWorkbook(bytes: Uint8Array): Promise<Sheet[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(Buffer.from(bytes));
  } catch (error) {
    throw new ShapeError("not a readable XLSX workbook", { cause: error });
  }

  return workbook.worksheets.map((worksheet) => {
    const rows: SheetCell[][] = [];
    for (let r = 1; r <= worksheet.rowCount; r++) {
      const row = worksheet.getRow(r);
      const cells: SheetCell[] = [];
      for (let c = 1; c <= row.cellCount; c++) {
        cells.push(toSheetCell(row.getCell(c).value));
      }
      rows.push(cells);
    }
    return { name: worksheet.name, rows };
  });
}

/**
 * Display text of a cell; dates as YYYY-MM-DD
 */
export function cellText(cell: SheetCell | undefined): string {
  if (cell === null || cell === undefined) return "";
  if (cell instanceof Date) return cell.toISOString().slice(0, 10);
  return String(cell);
}
