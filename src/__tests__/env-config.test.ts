import { describe, it, expect } from 'vitest';

import { loadEnvConfig } from '../config';
import { DEFAULT_CLASSIFIER_CONFIG, createIntentClassifier } from '../parsing';

const REQUIRED = {
  WHATSAPP_ACCESS_TOKEN: 'test-access-token',
  WHATSAPP_PHONE_NUMBER_ID: '100200300',
  WHATSAPP_VERIFY_TOKEN: 'test-verify-token',
  BACKEND_URL: 'http://backend.test/api/',
};

describe('loadEnvConfig', () => {
  it('should apply defaults for optional variables', () => {
    const config = loadEnvConfig(REQUIRED);

    expect(config).toEqual({
      port: 3000,
      logLevel: 'info',
      redisUrl: 'redis://localhost:6379',
      whatsapp: {
        accessToken: 'test-access-token',
        phoneNumberId: '100200300',
        verifyToken: 'test-verify-token',
        appSecret: undefined,
        apiVersion: 'v18.0',
      },
      backend: { baseUrl: 'http://backend.test/api', apiKey: undefined },
      classifier: DEFAULT_CLASSIFIER_CONFIG,
    });
  });

  it('should read overrides', () => {
    const config = loadEnvConfig({
      ...REQUIRED,
      PORT: '8080',
      LOG_LEVEL: 'DEBUG',
      WHATSAPP_APP_SECRET: 'test-secret',
      MIN_AIRTIME_AMOUNT: '100',
      DATA_GRANULARITY_MB: '100',
      NETWORK_PROVIDERS: 'MTN, airtel',
      CABLE_PROVIDERS: 'gotv',
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
    expect(config.whatsapp.appSecret).toBe('test-secret');
    expect(config.classifier.airtimeAmount).toEqual({ min: 100, max: 50000 });
    expect(config.classifier.dataSize.granularityMb).toBe(100);
    expect(config.classifier.networkProviders).toEqual(['mtn', 'airtel']);
    expect(config.classifier.cableProviders).toEqual(['gotv']);
  });

  it('should list every missing required variable in one error', () => {
    expect(() => loadEnvConfig({ BACKEND_URL: 'http://backend.test' })).toThrow(
      'Missing required environment variables: WHATSAPP_ACCESS_TOKEN, WHATSAPP_PHONE_NUMBER_ID, WHATSAPP_VERIFY_TOKEN'
    );
  });

  it('should report malformed values alongside missing ones', () => {
    expect(() =>
      loadEnvConfig({
        WHATSAPP_ACCESS_TOKEN: 'test-access-token',
        WHATSAPP_PHONE_NUMBER_ID: '100200300',
        WHATSAPP_VERIFY_TOKEN: 'test-verify-token',
        PORT: 'eighty',
        NETWORK_PROVIDERS: 'mtn,etisalat',
      })
    ).toThrow(
      [
        'Missing required environment variables: BACKEND_URL',
        'PORT must be a non-negative integer (got "eighty")',
        'NETWORK_PROVIDERS contains unknown provider "etisalat"',
      ].join('\n')
    );
  });

  it('should leave bound consistency to the classifier', () => {
    const config = loadEnvConfig({ ...REQUIRED, MIN_AIRTIME_AMOUNT: '900', MAX_AIRTIME_AMOUNT: '100' });

    expect(() => createIntentClassifier(config.classifier)).toThrow(
      'airtimeAmount.min (900) is greater than max (100)'
    );
  });
});
