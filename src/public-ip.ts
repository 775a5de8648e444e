import { isIP } from 'node:net';
import { IPIFY_URL, PUBLIC_IP_TIMEOUT_MS } from './constants.js';
import { NetworkError } from './errors.js';
import { readText, request, snippet } from './http.js';

export interface PublicIpOptions {
  /** Echo service returning the caller's address as plain text */
  url?: string;
  timeoutMs?: number;
}

const LABEL = 'Public IP service';

/**
 * Look up this machine's public IPv4/IPv6 address. One GET, no retries.
 */
export async function getPublicIp(options: PublicIpOptions = {}): Promise<string> {
  const res = await request(
    options.url || IPIFY_URL,
    { method: 'GET' },
    { label: LABEL, timeoutMs: options.timeoutMs ?? PUBLIC_IP_TIMEOUT_MS }
  );

  const body = await readText(res, LABEL);

  if (!res.ok) {
    throw new NetworkError(`${LABEL} error ${res.status}: ${snippet(body)}`);
  }

  const ip = body.trim();
  if (isIP(ip) === 0) {
    throw new NetworkError(`${LABEL}: response is not an IP address: "${snippet(ip)}"`);
  }

  return ip;
}
