import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadTrackerConfig } from '../config';
import { ConfigError } from '../errors';

describe('loadTrackerConfig', () => {
  it('fills every default from an empty environment', () => {
    const config = loadTrackerConfig({});

    expect(config.portal).toEqual({
      baseUrl: 'https://www.ireps.gov.in',
      loginUrl: 'https://www.ireps.gov.in/epsn/guestLogin.do',
      searchUrl: 'https://www.ireps.gov.in/epsn/anonymSearch.do',
      mobile: undefined,
      category: 'Works',
    });
    expect(config.paths.snapshotFile).toBe(path.resolve('data', 'tenders_memory.json'));
    expect(config.paths.otpCacheFile).toBe(path.resolve('data', 'otp_cache.json'));
    expect(config.browser.headless).toBe(true);
    expect(config.interactive).toBe(false);
    expect(config.otp.webhookPort).toBe(5050);
    expect(config.scraping).toEqual({
      minDelayMs: 2000,
      maxDelayMs: 4000,
      maxRetries: 3,
      retryBaseDelayMs: 2000,
      maxConsecutiveFailures: 3,
      maxRecords: 0,
    });
    expect(config.supabase).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('reads numbers, flags and trims a trailing slash off the base url', () => {
    const config = loadTrackerConfig({
      PORTAL_BASE_URL: 'https://portal.test/',
      PORTAL_MOBILE: ' 9000000000 ',
      HEADLESS: 'false',
      MAX_RETRIES: '5',
      LOG_LEVEL: 'debug',
    });

    expect(config.portal.baseUrl).toBe('https://portal.test');
    expect(config.portal.mobile).toBe('9000000000');
    expect(config.browser.headless).toBe(false);
    expect(config.interactive).toBe(true);
    expect(config.scraping.maxRetries).toBe(5);
    expect(config.logLevel).toBe('debug');
  });

  it('treats blank optional values as unset', () => {
    const config = loadTrackerConfig({ CAPTCHA_API_KEY: '  ', HEALTH_WEBHOOK_URL: '' });

    expect(config.captchaApiKey).toBeUndefined();
    expect(config.healthWebhookUrl).toBeUndefined();
  });

  it('lets command-line overrides win', () => {
    const config = loadTrackerConfig({ MAX_RECORDS: '50' }, { interactive: true, maxRecords: 5 });

    expect(config.interactive).toBe(true);
    expect(config.scraping.maxRecords).toBe(5);
  });

  it('reports every invalid variable at once', () => {
    let caught: unknown;
    try {
      loadTrackerConfig({ WEBHOOK_PORT: '70000', MAX_RETRIES: '0' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues.map((i) => i.split(':')[0])).toEqual([
      'WEBHOOK_PORT',
      'MAX_RETRIES',
    ]);
  });

  it('rejects a minimum delay above the maximum', () => {
    expect(() => loadTrackerConfig({ MIN_DELAY_MS: '5000', MAX_DELAY_MS: '1000' })).toThrow(
      'MIN_DELAY_MS (5000) must not exceed MAX_DELAY_MS (1000)',
    );
  });

  it('requires the Supabase url and key together', () => {
    expect(() => loadTrackerConfig({ SUPABASE_URL: 'https://db.test' })).toThrow(ConfigError);

    const config = loadTrackerConfig({
      SUPABASE_URL: 'https://db.test',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    });
    expect(config.supabase).toEqual({ url: 'https://db.test', serviceRoleKey: 'test-secret' });
  });
});
