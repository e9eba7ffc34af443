import ExcelJS from 'exceljs';
import { PROPERTY_COLUMNS, type PropertyRow } from '../types.js';

export const SPREADSHEET_FILE_NAME = 'properties_data.xlsx';
export const SPREADSHEET_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const SHEET_NAME = 'Properties';

/** Serializes rows into an in-memory xlsx file: one header row, no index column. */
export async function toSpreadsheet(rows: PropertyRow[]): Promise<ArrayBuffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);

  sheet.columns = PROPERTY_COLUMNS.map((key) => ({ header: key, key }));
  for (const row of rows) {
    sheet.addRow(PROPERTY_COLUMNS.map((key) => row[key]));
  }

  return workbook.xlsx.writeBuffer();
}
