import { promises as fs } from 'fs';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Parsed content of a JSON file, `undefined` when the file does not exist. */
export async function parseJson(fileName: string): Promise<unknown> {
  try {
    const content = await fs.readFile(fileName, 'utf-8');
    return JSON.parse(content);
  } catch (err) {
    if (isMissingFile(err)) {
      return undefined;
    }
    throw err;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
