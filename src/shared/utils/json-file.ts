import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

async function fsyncPath(filePath: string): Promise<void> {
  const handle = await fs.open(filePath, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Write JSON to `target` via a temp file in the same directory and a rename.
 *
 * @remarks
 * The temp file lives beside the target so the rename never crosses a
 * filesystem boundary. A failed write removes the temp file and leaves the
 * previous contents of `target` in place.
 */
export async function writeJsonAtomic(target: string, data: unknown): Promise<void> {
  const directory = path.dirname(target);
  await fs.mkdir(directory, { recursive: true });

  const tmp = path.join(directory, `.${path.basename(target)}.tmp-${uuidv4()}`);
  const json = `${JSON.stringify(data, null, 2)}\n`;

  try {
    await fs.writeFile(tmp, json, { encoding: 'utf8', flag: 'wx' });
    await fsyncPath(tmp);
    await fs.rename(tmp, target);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

/**
 * Read and parse a JSON file.
 *
 * @returns The parsed value, or `null` when the file does not exist
 * @throws SyntaxError when the file exists but is not valid JSON
 */
export async function readJsonFile(target: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(target, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
  return JSON.parse(raw);
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
