export { updateDnsIfNeeded, UpdateError } from './update.js';
export { run } from './run.js';
export { loadConfig } from './config.js';
export { getPublicIp } from './public-ip.js';
export { cleanDomain } from './domain.js';
export { createLogger, parseLogLevel } from './logger.js';
export {
  DdnsError,
  ConfigurationError,
  NetworkError,
  DecodeError,
  NotFoundError,
  ApiError,
} from './errors.js';
export {
  PORKBUN_API,
  TWILIO_API,
  IPIFY_URL,
  DEFAULT_RECORD_TYPE,
  IP_CHANGED_MESSAGE,
} from './constants.js';
export type {
  UpdateDependencies,
  UpdateOptions,
  UpdateResult,
  UpdateStep,
} from './update.js';
export type { RunOptions } from './run.js';
export type { DdnsConfig } from './config.js';
export type { PublicIpOptions } from './public-ip.js';
export type { DnsRecordProvider } from './provider.js';
export type { Notifier, NotifyResult } from './notifier.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
export type { DdnsErrorKind, ApiErrorOptions } from './errors.js';
