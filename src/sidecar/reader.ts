import { readFile } from 'node:fs/promises';

const BYTE_ORDER_MARK = /^\uFEFF/;

/**
 * Read and parse a sidecar as UTF-8 JSON. Throws on unreadable files and
 * malformed JSON; the caller decides how to record that.
 */
export async function readSidecar(sidecarPath: string): Promise<unknown> {
  const text = await readFile(sidecarPath, 'utf-8');
  const parsed: unknown = JSON.parse(text.replace(BYTE_ORDER_MARK, ''));
  return parsed;
}
