import * as fs from 'fs/promises';
import type { z } from 'zod';
import { env } from '../config.js';
import { HttpError } from '../errors.js';

function timeoutSignal(signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(env.HTTP_TIMEOUT_MS);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/** GET `url` and validate the JSON body against `schema`; throws HttpError on non-2xx. */
export async function getJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  init: { headers?: Record<string, string>; signal?: AbortSignal } = {},
): Promise<z.infer<S>> {
  const res = await fetch(url, { headers: init.headers, signal: timeoutSignal(init.signal) });
  if (!res.ok) {
    throw new HttpError(`GET ${redact(url)} returned ${res.status}`, res.status, redact(url));
  }
  return schema.parse(await res.json());
}

/** Download `url` to `destPath`. Empty bodies count as failures. */
export async function downloadFile(url: string, destPath: string, signal?: AbortSignal): Promise<number> {
  const res = await fetch(url, { signal: timeoutSignal(signal) });
  if (!res.ok) {
    throw new HttpError(`GET ${redact(url)} returned ${res.status}`, res.status, redact(url));
  }
  const body = Buffer.from(await res.arrayBuffer());
  if (body.length === 0) {
    throw new HttpError(`GET ${redact(url)} returned an empty body`, res.status, redact(url));
  }
  await fs.writeFile(destPath, body);
  return body.length;
}

/** Strip credentials from query strings before they reach logs or errors. */
export function redact(url: string): string {
  return url.replace(/([?&](?:api_key|key|token)=)[^&]*/gi, '$1***');
}
