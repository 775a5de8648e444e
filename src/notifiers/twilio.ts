import { TWILIO_API, TWILIO_TIMEOUT_MS } from '../constants.js';
import { ApiError, ConfigurationError, DdnsError } from '../errors.js';
import { request } from '../http.js';
import type { Notifier, NotifyResult } from '../notifier.js';

export interface TwilioOptions {
  accountSid: string;
  authToken: string;
  /** Sending phone number, E.164 */
  from: string;
  /** Destination phone number, E.164 */
  to: string;
  apiUrl?: string;
  timeoutMs?: number;
}

const LABEL = 'Twilio';

/**
 * Create an SMS notifier backed by the Twilio Messages API.
 *
 * A message counts as sent only on `201 Created`. Failures come back as
 * `{ ok: false, error }`.
 */
export function twilio(options: TwilioOptions): Notifier {
  const { accountSid, authToken } = options;

  if (!accountSid || !authToken) {
    throw new ConfigurationError('Twilio: accountSid and authToken are required');
  }

  const apiUrl = (options.apiUrl || TWILIO_API).replace(/\/+$/, '');
  const messagesUrl = `${apiUrl}/Accounts/${encodeURIComponent(accountSid)}/Messages.json`;
  const authorization = `Basic ${Buffer.from(
    `${accountSid}:${authToken}`,
    'utf8'
  ).toString('base64')}`;

  async function send(message: string): Promise<void> {
    const res = await request(
      messagesUrl,
      {
        method: 'POST',
        headers: {
          Authorization: authorization,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({
          To: options.to,
          From: options.from,
          Body: message,
        }).toString(),
      },
      { label: LABEL, timeoutMs: options.timeoutMs ?? TWILIO_TIMEOUT_MS }
    );

    if (res.status !== 201) {
      throw new ApiError(`Twilio API error: status code ${res.status}`, {
        status: res.status,
      });
    }
  }

  return {
    async notify(message: string): Promise<NotifyResult> {
      try {
        await send(message);
        return { ok: true };
      } catch (err) {
        if (err instanceof DdnsError) {
          return { ok: false, error: err };
        }
        throw err;
      }
    },
  };
}
