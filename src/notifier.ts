import type { DdnsError } from './errors.js';

/**
 * Outcome of a notification attempt. Failures are returned, not thrown, so the
 * caller can log them without affecting the run.
 */
export type NotifyResult = { ok: true } | { ok: false; error: DdnsError };

export interface Notifier {
  notify(message: string): Promise<NotifyResult>;
}
