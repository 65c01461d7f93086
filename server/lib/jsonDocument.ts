import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { z } from 'zod';

import { validatePayload } from './apiSchemas.js';

export type DocumentReadResult<T> =
  | { status: 'missing' }
  | { status: 'ok'; data: T }
  | { status: 'invalid'; detail: string };

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export async function readJsonDocument<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<DocumentReadResult<T>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (isNotFound(err)) return { status: 'missing' };
    throw err;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err: unknown) {
    return { status: 'invalid', detail: `not valid JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  const result = validatePayload(schema, payload);
  if (!result.ok) return { status: 'invalid', detail: result.issues };
  return { status: 'ok', data: result.data };
}

/** Write via temp file + rename so readers never observe a half-written document. */
export async function writeJsonDocument(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
  await rename(tempPath, path);
}
