import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { run } from '../src/run.js';
import { ConfigurationError } from '../src/errors.js';
import { UpdateError } from '../src/update.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(JSON.stringify(body)),
  };
}

function textResponse(body: string, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  };
}

function createFakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const env = {
  PORKBUN_API_KEY: 'test-key',
  PORKBUN_SECRET_KEY: 'test-secret',
  PORKBUN_RECORD_ID: '123456',
  PORKBUN_DOMAIN: 'example.com',
  PORKBUN_SUBDOMAIN: 'home',
  TWILIO_ACCOUNT_SID: 'AC123',
  TWILIO_AUTH_TOKEN: 'test-token',
  TWILIO_FROM_PHONE: '+15550002222',
  TWILIO_TO_PHONE: '+15550001111',
};

const retrieved = (content: string) =>
  jsonResponse({ status: 'SUCCESS', records: [{ id: '123456', content }] });

describe('run', () => {
  it('exits cleanly without writing when the IP is unchanged', async () => {
    mockFetch
      .mockResolvedValueOnce(retrieved('1.2.3.4'))
      .mockResolvedValueOnce(textResponse('1.2.3.4'));

    const code = await run({ env, logger: createFakeLogger() });

    expect(code).toBe(0);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('writes the new IP and sends one SMS when the IP changed', async () => {
    mockFetch
      .mockResolvedValueOnce(retrieved('1.2.3.4'))
      .mockResolvedValueOnce(textResponse('5.6.7.8'))
      .mockResolvedValueOnce(jsonResponse({ status: 'SUCCESS' }))
      .mockResolvedValueOnce(jsonResponse({ sid: 'SM1' }, 201));

    const code = await run({ env, logger: createFakeLogger() });

    expect(code).toBe(0);
    expect(mockFetch).toHaveBeenCalledTimes(4);

    const [editUrl, editInit] = mockFetch.mock.calls[2]!;
    expect(editUrl).toBe(
      'https://api.porkbun.com/api/json/v3/dns/edit/example.com/123456'
    );
    expect(JSON.parse(editInit.body)).toMatchObject({ content: '5.6.7.8' });

    const [smsUrl, smsInit] = mockFetch.mock.calls[3]!;
    expect(smsUrl).toBe(
      'https://api.twilio.com/2010-04-01/Accounts/AC123/Messages.json'
    );
    expect(new URLSearchParams(smsInit.body).get('Body')).toBe(
      'Your IP has changed'
    );
  });

  it('fails before any request when credentials are missing', async () => {
    const logger = createFakeLogger();

    const code = await run({
      env: { ...env, PORKBUN_RECORD_ID: '' },
      logger,
    });

    expect(code).toBe(1);
    expect(mockFetch).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      'error in the configuration',
      undefined,
      expect.any(ConfigurationError)
    );
  });

  it('fails without writing when the record does not exist', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ status: 'SUCCESS', records: [] })
    );
    const logger = createFakeLogger();

    const code = await run({ env, logger });

    expect(code).toBe(1);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      'error updating the DNS',
      { step: 'read-record' },
      expect.any(UpdateError)
    );
  });

  it('fails with the provider message when the edit is rejected', async () => {
    mockFetch
      .mockResolvedValueOnce(retrieved('1.2.3.4'))
      .mockResolvedValueOnce(textResponse('5.6.7.8'))
      .mockResolvedValueOnce(
        jsonResponse({ status: 'ERROR', message: 'Invalid record ID.' })
      );
    const logger = createFakeLogger();

    const code = await run({ env, logger });

    expect(code).toBe(1);
    expect(mockFetch).toHaveBeenCalledTimes(3);

    const [, , error] = logger.error.mock.calls[0]!;
    expect(error).toBeInstanceOf(UpdateError);
    expect(error.message).toBe(
      'failed to update the DNS record: Porkbun API error: Invalid record ID.'
    );
  });

  it('keeps a zero exit code when the SMS is rejected', async () => {
    mockFetch
      .mockResolvedValueOnce(retrieved('1.2.3.4'))
      .mockResolvedValueOnce(textResponse('5.6.7.8'))
      .mockResolvedValueOnce(jsonResponse({ status: 'SUCCESS' }))
      .mockResolvedValueOnce(jsonResponse({ message: 'bad number' }, 400));
    const logger = createFakeLogger();

    const code = await run({ env, logger });

    expect(code).toBe(0);
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      'failed to send the change notification',
      undefined,
      expect.objectContaining({ status: 400 })
    );
  });

  it('skips the SMS when Twilio is not configured', async () => {
    mockFetch
      .mockResolvedValueOnce(retrieved('1.2.3.4'))
      .mockResolvedValueOnce(textResponse('5.6.7.8'))
      .mockResolvedValueOnce(jsonResponse({ status: 'SUCCESS' }));
    const logger = createFakeLogger();

    const code = await run({
      env: { ...env, TWILIO_ACCOUNT_SID: '' },
      logger,
    });

    expect(code).toBe(0);
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledWith(
      'SMS notifications disabled: TWILIO_ACCOUNT_SID or TWILIO_AUTH_TOKEN is not set'
    );
  });

  it('does not write on a dry run', async () => {
    mockFetch
      .mockResolvedValueOnce(retrieved('1.2.3.4'))
      .mockResolvedValueOnce(textResponse('5.6.7.8'));

    const code = await run({ env, dryRun: true, logger: createFakeLogger() });

    expect(code).toBe(0);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });
});
