import { z } from 'zod';
import { DEFAULT_RECORD_TYPE, IPIFY_URL, PORKBUN_API } from './constants.js';
import { ConfigurationError } from './errors.js';
import type { PorkbunOptions } from './providers/porkbun.js';
import type { PublicIpOptions } from './public-ip.js';
import type { TwilioOptions } from './notifiers/twilio.js';

export interface DdnsConfig {
  porkbun: Required<Omit<PorkbunOptions, 'timeoutMs'>>;
  publicIp: Required<Pick<PublicIpOptions, 'url'>>;
  /** Absent when SMS notifications are not configured */
  twilio?: Omit<TwilioOptions, 'apiUrl' | 'timeoutMs'>;
}

const required = z
  .string({ required_error: 'is not set' })
  .trim()
  .min(1, 'is empty');

function optional(fallback = '') {
  return z
    .string()
    .optional()
    .transform((value) => value?.trim() || fallback);
}

const envSchema = z.object({
  PORKBUN_API_KEY: required,
  PORKBUN_SECRET_KEY: required,
  PORKBUN_RECORD_ID: required,
  PORKBUN_DOMAIN: optional(),
  PORKBUN_SUBDOMAIN: optional(),
  PORKBUN_RECORD_TYPE: optional(DEFAULT_RECORD_TYPE),
  PORKBUN_API_URL: optional(PORKBUN_API),
  PUBLIC_IP_URL: optional(IPIFY_URL),
  TWILIO_ACCOUNT_SID: optional(),
  TWILIO_AUTH_TOKEN: optional(),
  TWILIO_FROM_PHONE: optional(),
  TWILIO_TO_PHONE: optional(),
});

/**
 * Build the run configuration from environment variables.
 *
 * Only the Porkbun key pair and record ID are required; everything else falls
 * back to a default or stays empty.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DdnsConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const missing = parsed.error.issues.map((i) => i.path.join('.'));
    throw new ConfigurationError(
      `required API keys missing: ${[...new Set(missing)].join(', ')}`
    );
  }

  const vars = parsed.data;
  const hasTwilio = Boolean(vars.TWILIO_ACCOUNT_SID && vars.TWILIO_AUTH_TOKEN);

  return {
    porkbun: {
      apiUrl: vars.PORKBUN_API_URL,
      apiKey: vars.PORKBUN_API_KEY,
      secretKey: vars.PORKBUN_SECRET_KEY,
      recordId: vars.PORKBUN_RECORD_ID,
      domain: vars.PORKBUN_DOMAIN,
      recordName: vars.PORKBUN_SUBDOMAIN,
      recordType: vars.PORKBUN_RECORD_TYPE,
    },
    publicIp: { url: vars.PUBLIC_IP_URL },
    twilio: hasTwilio
      ? {
          accountSid: vars.TWILIO_ACCOUNT_SID,
          authToken: vars.TWILIO_AUTH_TOKEN,
          from: vars.TWILIO_FROM_PHONE,
          to: vars.TWILIO_TO_PHONE,
        }
      : undefined,
  };
}
