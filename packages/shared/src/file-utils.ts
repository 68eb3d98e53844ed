import fs from "node:fs/promises";

export type JsonReadResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string; detail: string };

export function reasonFromCode(code:string | undefined) {
  const reason = code || 'UNKNOWN';
  const map:Record<string, string> = {
    EACCES: 'permission_denied',
    EPERM: 'operation_not_permitted',
    ENOENT: 'file_not_found',
    EISDIR: 'is_a_directory',
    ENOTDIR:'not_a_directory'
  };
  return map[reason] || reason.toLowerCase();
}

export function extractErrorCode(error:unknown):string | undefined {
    if (typeof error === 'object'
      && error !== null && 'code' in error
      && typeof error.code === 'string'
    ) {
      return error.code;
    }
    return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read and parse a JSON file.
 * Filesystem failures are reported through `reasonFromCode`, parse failures as `invalid_json`.
 */
export async function readJsonFile(file: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    return { ok: false, error: reasonFromCode(extractErrorCode(error)), detail: errorMessage(error) };
  }

  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: 'invalid_json', detail: errorMessage(error) };
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
