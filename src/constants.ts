/** Porkbun JSON API base (retrieve/edit paths are appended) */
export const PORKBUN_API = 'https://api.porkbun.com/api/json/v3';

/** Twilio REST API base */
export const TWILIO_API = 'https://api.twilio.com/2010-04-01';

/** IP echo service returning the caller's address as plain text */
export const IPIFY_URL = 'https://api.ipify.org?format=text';

/** Record type written when none is configured */
export const DEFAULT_RECORD_TYPE = 'A';

/** Body of the SMS sent after the record changes */
export const IP_CHANGED_MESSAGE = 'Your IP has changed';

export const PUBLIC_IP_TIMEOUT_MS = 10_000;
export const PORKBUN_TIMEOUT_MS = 30_000;
export const TWILIO_TIMEOUT_MS = 30_000;
