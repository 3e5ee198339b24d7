import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import Papa from "papaparse";
import { v4 as uuidv4 } from "uuid";
import { isMissingFile } from "../../utils/helpers/fsHelpers";
import { logWarn } from "../../utils/logger";

export type CsvRow = Record<string, string>;

/**
 * Reads a headed CSV file. A missing file reads as no rows; columns absent
 * from an older file read as empty strings.
 */
export async function readCsv(file: string, columns: readonly string[]): Promise<CsvRow[]> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }

  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
  });
  if (parsed.errors.length > 0) {
    logWarn(`CSV parse issues in ${path.basename(file)}`, parsed.errors.map((e) => e.message));
  }

  return parsed.data.map((raw) => {
    const row: CsvRow = {};
    for (const column of columns) {
      row[column] = raw[column] ?? "";
    }
    return row;
  });
}

/**
 * Rewrites the whole file. Content goes to a sibling temp file first and is
 * renamed over the target, so readers never see a half-written file.
 */
export async function writeCsv(file: string, columns: readonly string[], rows: CsvRow[]): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });

  const body = Papa.unparse([[...columns], ...rows.map((row) => columns.map((column) => row[column] ?? ""))], {
    newline: "\n",
  });

  const temp = `${file}.${uuidv4()}.tmp`;
  try {
    await writeFile(temp, `${body}\n`, "utf8");
    await rename(temp, file);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}
