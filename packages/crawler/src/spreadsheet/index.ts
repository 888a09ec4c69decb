export { readWorkbook, cellText, type Sheet, type SheetCell } from "./read-workbook.js";
