import { promises as fs } from 'fs';
import path from 'path';

export type CsvRow = Record<string, string | number | undefined>;

export function toCsvLine(values: readonly (string | number | undefined)[]): string {
  return values
    .map(value => `"${(value === undefined ? '' : String(value)).replace(/"/g, '""')}"`)
    .join(',');
}

/**
 * Appends one row, creating the file and its header line first when the
 * file does not exist yet. Column order follows the row's keys.
 */
export async function appendCsv(filePath: string, row: CsvRow): Promise<void> {
  const headers = Object.keys(row);
  try {
    await fs.access(filePath);
  } catch (error: unknown) {
    if (error instanceof Error && (error as NodeJS.ErrnoException).code === 'ENOENT') {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, headers.join(',') + '\n');
    } else {
      throw error;
    }
  }

  await fs.appendFile(filePath, toCsvLine(headers.map(header => row[header])) + '\n');
}
