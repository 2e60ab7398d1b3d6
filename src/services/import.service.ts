import csv from "csv-parser";
import { createReadStream } from "fs";
import { Readable } from "stream";
import { z } from "zod";
import { Store } from "../db/store";
import { ImportResult } from "../types";
import { StoreError, ValidationError, errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { describeIssues } from "../utils/validation";
import { contactInput } from "./contact.service";
import { jobInput } from "./job.service";

const log = createLogger("import");

export const CONTACT_COLUMNS = ["name", "email", "company_name"] as const;
export const JOB_COLUMNS = ["company_name", "job_title", "date_applied"] as const;

type CsvRow = Record<string, string>;

export interface ParsedCsv {
  headers: string[];
  rows: CsvRow[];
}

function readCsv(source: Readable, origin: string): Promise<ParsedCsv> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: CsvRow[] = [];

    // pipe() does not forward source errors such as ENOENT
    source.on("error", (error: Error) => {
      reject(new ValidationError(`Cannot read ${origin}: ${error.message}`));
    });

    source
      .pipe(csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() }))
      .on("headers", (headerList: string[]) => {
        headers = headerList;
      })
      .on("data", (row: CsvRow) => {
        rows.push(row);
      })
      .on("end", () => resolve({ headers, rows }))
      .on("error", (error: Error) => {
        reject(new ValidationError(`CSV parsing failed: ${error.message}`));
      });
  });
}

export function parseCsvText(text: string): Promise<ParsedCsv> {
  return readCsv(Readable.from([text]), "CSV text");
}

export function parseCsvFile(filePath: string): Promise<ParsedCsv> {
  return readCsv(createReadStream(filePath), filePath);
}

function requireColumns(
  headers: string[],
  required: readonly string[]
): void {
  const missing = required.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new ValidationError("CSV is missing required columns", missing);
  }
}

/** Empty cells are treated as absent. */
function cell(row: CsvRow, column: string): string | undefined {
  const value = row[column]?.trim();
  return value ? value : undefined;
}

function rowFailure(error: unknown): string {
  if (error instanceof z.ZodError) return describeIssues(error).join("; ");
  return errorMessage(error);
}

async function importRows(
  rows: CsvRow[],
  insertRow: (row: CsvRow) => Promise<void>
): Promise<ImportResult> {
  const result: ImportResult = { imported: 0, errors: [] };

  for (const [index, row] of rows.entries()) {
    try {
      await insertRow(row);
      result.imported++;
    } catch (error) {
      if (error instanceof StoreError) throw error;
      result.errors.push(`Row ${index + 1}: ${rowFailure(error)}`);
    }
  }
  return result;
}

export async function importContacts(
  store: Store,
  csvData: ParsedCsv
): Promise<ImportResult> {
  requireColumns(csvData.headers, CONTACT_COLUMNS);

  const result = await importRows(csvData.rows, async (row) => {
    const data = contactInput.parse({
      name: cell(row, "name") ?? "",
      email: cell(row, "email") ?? "",
      companyName: cell(row, "company_name") ?? "",
      contactType: cell(row, "contact_type"),
      phone: cell(row, "phone"),
      linkedinUrl: cell(row, "linkedin_url"),
    });
    await store.insertContact(data);
  });

  log.info(
    `Imported ${result.imported} contact(s), ${result.errors.length} row error(s)`
  );
  return result;
}

export async function importJobs(
  store: Store,
  csvData: ParsedCsv
): Promise<ImportResult> {
  requireColumns(csvData.headers, JOB_COLUMNS);

  const result = await importRows(csvData.rows, async (row) => {
    const data = jobInput.parse({
      companyName: cell(row, "company_name") ?? "",
      jobTitle: cell(row, "job_title") ?? "",
      dateApplied: cell(row, "date_applied") ?? "",
      status: cell(row, "status"),
      location: cell(row, "location"),
      jobLink: cell(row, "job_link"),
      priority: cell(row, "priority"),
      notes: cell(row, "notes"),
    });
    if (data.jobLink && (await store.findJobByLink(data.jobLink))) {
      throw new ValidationError(`Job link already tracked: ${data.jobLink}`);
    }
    await store.insertJob(data);
  });

  log.info(
    `Imported ${result.imported} job(s), ${result.errors.length} row error(s)`
  );
  return result;
}
