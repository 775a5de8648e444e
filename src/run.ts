import { loadConfig } from './config.js';
import type { DdnsConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import { twilio } from './notifiers/twilio.js';
import { porkbun } from './providers/porkbun.js';
import { getPublicIp } from './public-ip.js';
import { UpdateError, updateDnsIfNeeded } from './update.js';

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  dryRun?: boolean;
  logger?: Logger;
}

/**
 * One updater run. Resolves to the process exit code: `0` on success
 * (including a failed notification), `1` on any fatal error.
 */
export async function run(options: RunOptions = {}): Promise<number> {
  const { env = process.env, dryRun = false, logger = defaultLogger } = options;

  let config: DdnsConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.error('error in the configuration', undefined, err);
      return 1;
    }
    throw err;
  }

  if (!config.twilio) {
    logger.warn(
      'SMS notifications disabled: TWILIO_ACCOUNT_SID or TWILIO_AUTH_TOKEN is not set'
    );
  }

  try {
    await updateDnsIfNeeded(
      {
        provider: porkbun(config.porkbun),
        resolvePublicIp: () => getPublicIp(config.publicIp),
        notifier: config.twilio ? twilio(config.twilio) : undefined,
        logger,
      },
      { dryRun }
    );
    return 0;
  } catch (err) {
    if (err instanceof UpdateError) {
      logger.error('error updating the DNS', { step: err.step }, err);
      return 1;
    }
    throw err;
  }
}
