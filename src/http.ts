import type { z } from 'zod';
import { ApiError, DecodeError, NetworkError, errorMessage } from './errors.js';

export interface RequestOptions {
  /** Name used to prefix error messages (e.g. "Porkbun") */
  label: string;
  timeoutMs: number;
}

/**
 * `fetch` with a per-request timeout. Any transport failure, including the
 * timeout firing, becomes a `NetworkError`.
 */
export async function request(
  url: string,
  init: RequestInit,
  { label, timeoutMs }: RequestOptions
): Promise<Response> {
  try {
    return await fetch(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new NetworkError(`${label}: request failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export async function readText(res: Response, label: string): Promise<string> {
  try {
    return await res.text();
  } catch (err) {
    throw new NetworkError(
      `${label}: failed to read response body: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

/**
 * Read and parse a JSON body. A non-JSON body on an error status is reported
 * as an `ApiError` carrying that status; otherwise it is a `DecodeError`.
 */
export async function readJson(res: Response, label: string): Promise<unknown> {
  const text = await readText(res, label);
  try {
    return JSON.parse(text);
  } catch (err) {
    if (!res.ok) {
      throw new ApiError(`${label} API error ${res.status}: ${snippet(text)}`, {
        status: res.status,
      });
    }
    throw new DecodeError(`${label}: response is not valid JSON`, {
      cause: err,
    });
  }
}

export function decode<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  label: string
): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new DecodeError(`${label}: unexpected response: ${details}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function snippet(text: string, max = 200): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}
