import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('loadServerEnv applies defaults and parses booleans', async () => {
  const { loadServerEnv } = await import('../src/env');

  const env = loadServerEnv({
    PUBLIC_BASE_URL: 'https://voice.example.test',
    MEDIA_STREAM_TOKEN: 'test-token',
    MEDIA_STREAM_ENABLED: 'False',
  });

  assert.deepEqual(env, {
    PORT: 3000,
    PUBLIC_BASE_URL: 'https://voice.example.test',
    MEDIA_STREAM_TOKEN: 'test-token',
    MEDIA_STREAM_ENABLED: false,
  });
});

test('loadServerEnv reports every invalid variable at once', async () => {
  const { loadServerEnv } = await import('../src/env');
  const { ConfigurationError } = await import('../src/twilio/errors');

  assert.throws(
    () => loadServerEnv({ PORT: 'abc' }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.deepEqual(
        error.issues.map((issue) => issue.split(':')[0]),
        ['PORT', 'PUBLIC_BASE_URL', 'MEDIA_STREAM_TOKEN'],
      );
      return true;
    },
  );
});

test('loadTwilioEnv treats blank optional values as unset', async () => {
  const { loadTwilioEnv } = await import('../src/env');

  const env = loadTwilioEnv({
    TWILIO_ACCOUNT_SID: 'AC123',
    TWILIO_AUTH_TOKEN: 'test-secret',
    TWILIO_PHONE_NUMBER: '',
    TWILIO_BASE_URL: ' ',
  });

  assert.equal(env.TWILIO_PHONE_NUMBER, undefined);
  assert.equal(env.TWILIO_BASE_URL, 'https://api.twilio.com');
});

test('loadTwilioEnv requires the API key and its secret together', async () => {
  const { loadTwilioEnv } = await import('../src/env');

  assert.throws(
    () =>
      loadTwilioEnv({
        TWILIO_ACCOUNT_SID: 'AC123',
        TWILIO_AUTH_TOKEN: 'test-secret',
        TWILIO_API_KEY_SECRET: 'test-key-secret',
      }),
    /TWILIO_API_KEY: TWILIO_API_KEY and TWILIO_API_KEY_SECRET must be set together/,
  );
});
