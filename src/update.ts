import { IP_CHANGED_MESSAGE } from './constants.js';
import { errorMessage } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { Notifier } from './notifier.js';
import type { DnsRecordProvider } from './provider.js';

export type UpdateStep = 'read-record' | 'public-ip' | 'write-record';

const STEP_CONTEXT: Record<UpdateStep, string> = {
  'read-record': 'failed to read the current DNS record',
  'public-ip': 'failed to get the public IP',
  'write-record': 'failed to update the DNS record',
};

/** A fatal failure in one step of the update; the original error is `cause` */
export class UpdateError extends Error {
  readonly step: UpdateStep;

  constructor(step: UpdateStep, cause: unknown) {
    super(`${STEP_CONTEXT[step]}: ${errorMessage(cause)}`, { cause });
    this.name = 'UpdateError';
    this.step = step;
  }
}

export interface UpdateDependencies {
  provider: DnsRecordProvider;
  resolvePublicIp: () => Promise<string>;
  /** Omit to skip notifications */
  notifier?: Notifier;
  logger?: Logger;
}

export interface UpdateOptions {
  /** Compare only; never write or notify */
  dryRun?: boolean;
  /** Defaults to "Your IP has changed" */
  message?: string;
}

export interface UpdateResult {
  /** `stale` is only returned by a dry run that found a mismatch */
  status: 'unchanged' | 'updated' | 'stale';
  dnsIp: string;
  publicIp: string;
  notified: boolean;
}

async function step<T>(name: UpdateStep, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new UpdateError(name, err);
  }
}

/**
 * Bring the DNS record in line with the machine's public IP.
 *
 * 1. Reads the record's current content
 * 2. Resolves the public IP
 * 3. If they match, stops without side effects
 * 4. Otherwise writes the new IP, then sends one notification
 *
 * A failed notification is logged and does not fail the update.
 */
export async function updateDnsIfNeeded(
  deps: UpdateDependencies,
  options: UpdateOptions = {}
): Promise<UpdateResult> {
  const { provider, resolvePublicIp, notifier, logger = defaultLogger } = deps;

  const dnsIp = await step('read-record', () => provider.getRecordContent());
  const publicIp = await step('public-ip', resolvePublicIp);

  if (dnsIp === publicIp) {
    logger.info('DNS record is up to date', { ip: publicIp });
    return { status: 'unchanged', dnsIp, publicIp, notified: false };
  }

  if (options.dryRun) {
    logger.info('DNS record is stale, not updating (dry run)', { dnsIp, publicIp });
    return { status: 'stale', dnsIp, publicIp, notified: false };
  }

  await step('write-record', () => provider.updateRecordContent(publicIp));
  logger.info('DNS record updated', { from: dnsIp, to: publicIp });

  let notified = false;
  if (notifier) {
    const result = await notifier.notify(options.message ?? IP_CHANGED_MESSAGE);
    if (result.ok) {
      notified = true;
    } else {
      logger.warn('failed to send the change notification', undefined, result.error);
    }
  }

  return { status: 'updated', dnsIp, publicIp, notified };
}
