import { type Auth, google, type sheets_v4 } from "googleapis";

import type { CellValue, PersistenceCollaborator, SheetDestination } from "../types";

export class SheetsWriter implements PersistenceCollaborator {
  private readonly sheets: sheets_v4.Sheets;

  constructor(auth: Auth.GoogleAuth) {
    this.sheets = google.sheets({ version: "v4", auth });
  }

  async writeHeader({ spreadsheetId, range }: SheetDestination, columns: readonly string[]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId,
      range,
      valueInputOption: "RAW",
      requestBody: { values: [[...columns]] },
    });
  }

  async appendRows({ spreadsheetId, range }: SheetDestination, rows: CellValue[][]): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId,
      range,
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: rows },
    });
  }

  async clearRange({ spreadsheetId, range }: SheetDestination): Promise<void> {
    await this.sheets.spreadsheets.values.clear({ spreadsheetId, range, requestBody: {} });
  }
}
