import assert from 'node:assert/strict';
import { test } from 'node:test';
import { listen, setTestEnv } from './testEnv';

setTestEnv();

const DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const baseEnv = {
  PORT: 3000,
  PUBLIC_BASE_URL: 'https://voice.example.test/',
  MEDIA_STREAM_TOKEN: 'test-token',
  MEDIA_STREAM_ENABLED: true,
};

const incomingForm = {
  CallSid: 'CA123',
  AccountSid: 'AC123',
  From: '+15557654321',
  To: '+15551234567',
  CallStatus: 'ringing',
  ApiVersion: '2010-04-01',
  Direction: 'inbound',
};

function postForm(url: string, form: Record<string, string>): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(form).toString(),
  });
}

async function startApp(env = baseEnv) {
  const { buildServer } = await import('../src/server');
  const { server, wss } = buildServer(env);
  const listening = await listen(server);
  return {
    baseUrl: listening.baseUrl,
    close: async () => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close();
      await listening.close();
    },
  };
}

test('buildMediaStreamUrl always produces a wss URL with the token', async () => {
  const { buildMediaStreamUrl } = await import('../src/routes/voiceWebhook');

  assert.equal(
    buildMediaStreamUrl('https://voice.example.test/', 'a b'),
    'wss://voice.example.test/media/stream?token=a%20b',
  );
  assert.equal(
    buildMediaStreamUrl('http://localhost:3000', 'test-token'),
    'wss://localhost:3000/media/stream?token=test-token',
  );
  assert.equal(
    buildMediaStreamUrl('https://voice.example.test/app/?x=1', 'test-token'),
    'wss://voice.example.test/media/stream?token=test-token',
  );
});

test('incoming call is connected to the media stream', async () => {
  const app = await startApp();

  try {
    const response = await postForm(`${app.baseUrl}/voice/incoming`, incomingForm);

    assert.equal(response.status, 200);
    assert.match(response.headers.get('content-type') ?? '', /^application\/xml/);
    assert.ok(response.headers.get('x-request-id'));
    assert.equal(
      await response.text(),
      `${DECLARATION}<Response><Connect><Stream url="wss://voice.example.test/media/stream?token=test-token"><Parameter name="callSid" value="CA123" /></Stream></Connect></Response>`,
    );
  } finally {
    await app.close();
  }
});

test('incoming call is rejected when media streaming is disabled', async () => {
  const app = await startApp({ ...baseEnv, MEDIA_STREAM_ENABLED: false });

  try {
    const response = await postForm(`${app.baseUrl}/voice/incoming`, incomingForm);

    assert.equal(response.status, 200);
    assert.equal(await response.text(), `${DECLARATION}<Response><Reject /></Response>`);
  } finally {
    await app.close();
  }
});

test('malformed webhook bodies get a 400', async () => {
  const app = await startApp();

  try {
    const response = await postForm(`${app.baseUrl}/voice/incoming`, { CallSid: 'CA123' });

    assert.equal(response.status, 400);
    const payload: unknown = await response.json();
    assert.ok(typeof payload === 'object' && payload !== null && 'error' in payload);
    assert.equal(payload.error, 'invalid_request');
  } finally {
    await app.close();
  }
});

test('status, amd and conference callbacks answer 204', async () => {
  const app = await startApp();

  try {
    const status = await postForm(`${app.baseUrl}/voice/status`, { ...incomingForm, CallStatus: 'no-answer' });
    const amd = await postForm(`${app.baseUrl}/voice/amd`, {
      CallSid: 'CA123',
      AccountSid: 'AC123',
      AnsweredBy: 'human',
    });
    const conference = await postForm(`${app.baseUrl}/voice/conference`, {
      ConferenceSid: 'CF1',
      FriendlyName: 'standup',
      AccountSid: 'AC123',
      SequenceNumber: '1',
      Timestamp: 'Tue, 01 Oct 2024 10:00:00 +0000',
      StatusCallbackEvent: 'conference-start',
    });

    assert.deepEqual([status.status, amd.status, conference.status], [204, 204, 204]);
  } finally {
    await app.close();
  }
});

test('health and metrics endpoints respond', async () => {
  const app = await startApp();

  try {
    const health = await fetch(`${app.baseUrl}/health`);
    assert.equal(health.status, 200);
    const payload: unknown = await health.json();
    assert.ok(typeof payload === 'object' && payload !== null && 'status' in payload);
    assert.equal(payload.status, 'ok');

    const metrics = await fetch(`${app.baseUrl}/metrics`);
    assert.equal(metrics.status, 200);
    assert.match(await metrics.text(), /# TYPE callwire_api_request_duration_ms histogram/);
  } finally {
    await app.close();
  }
});
