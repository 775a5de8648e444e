import { z } from 'zod';
import {
  DEFAULT_RECORD_TYPE,
  PORKBUN_API,
  PORKBUN_TIMEOUT_MS,
} from '../constants.js';
import { cleanDomain } from '../domain.js';
import { ApiError, ConfigurationError, NotFoundError } from '../errors.js';
import { decode, readJson, request } from '../http.js';
import type { DnsRecordProvider } from '../provider.js';

export interface PorkbunOptions {
  apiKey: string;
  secretKey: string;
  /** Porkbun's ID of the record to keep in sync */
  recordId: string;
  /** Zone the record lives in (e.g. example.com) */
  domain: string;
  /** Subdomain part of the record; empty for the apex */
  recordName?: string;
  /** Defaults to `A` */
  recordType?: string;
  /** Defaults to the public v3 API */
  apiUrl?: string;
  timeoutMs?: number;
}

const statusSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

const retrieveSchema = z.object({
  status: z.string(),
  records: z.array(
    z.object({
      id: z.string().optional(),
      name: z.string().optional(),
      type: z.string().optional(),
      content: z.string(),
    })
  ),
});

const LABEL = 'Porkbun';

/**
 * Create a Porkbun DNS adapter for a single record.
 *
 * Uses the Porkbun JSON API v3 with native `fetch` (Node 18+). Every call is a
 * POST authenticated by the key pair in the request body.
 */
export function porkbun(options: PorkbunOptions): DnsRecordProvider {
  const { apiKey, secretKey, recordId } = options;

  if (!apiKey || !secretKey || !recordId) {
    throw new ConfigurationError(
      'Porkbun: apiKey, secretKey and recordId are required'
    );
  }

  const apiUrl = (options.apiUrl || PORKBUN_API).replace(/\/+$/, '');
  const domain = cleanDomain(options.domain);
  const recordPath = `${encodeURIComponent(domain)}/${encodeURIComponent(recordId)}`;
  const timeoutMs = options.timeoutMs ?? PORKBUN_TIMEOUT_MS;

  async function pbFetch(
    path: string,
    body: Record<string, string> = {}
  ): Promise<unknown> {
    const res = await request(
      `${apiUrl}${path}`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          secretapikey: secretKey,
          apikey: apiKey,
          ...body,
        }),
      },
      { label: LABEL, timeoutMs }
    );

    const data = await readJson(res, LABEL);
    const { status, message } = decode(statusSchema, data, LABEL);

    if (status !== 'SUCCESS') {
      throw new ApiError(`Porkbun API error: ${message ?? status}`, {
        status: res.ok ? undefined : res.status,
        providerMessage: message,
      });
    }

    return data;
  }

  return {
    async getRecordContent(): Promise<string> {
      const data = await pbFetch(`/dns/retrieve/${recordPath}`);
      const { records } = decode(retrieveSchema, data, LABEL);

      const [first] = records;
      if (!first) {
        throw new NotFoundError(
          `Porkbun: no DNS record found for ID "${recordId}" in "${domain}"`
        );
      }

      return first.content;
    },

    async updateRecordContent(content: string): Promise<void> {
      await pbFetch(`/dns/edit/${recordPath}`, {
        name: options.recordName ?? '',
        type: options.recordType || DEFAULT_RECORD_TYPE,
        content,
      });
    },
  };
}
