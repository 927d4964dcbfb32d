import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

const voiceForm: Record<string, string> = {
  CallSid: 'CA123',
  AccountSid: 'AC123',
  From: '+15557654321',
  To: '+15551234567',
  CallStatus: 'ringing',
  ApiVersion: '2010-04-01',
  Direction: 'inbound',
  FromCity: 'SPRINGFIELD',
  ToZip: '',
  Digits: '42',
};

test('voice parameters keep unknown keys as extras', async () => {
  const { getExtra, isNoAnswer, parseVoiceRequestParams } = await import('../src/webhooks/requestParams');

  const params = parseVoiceRequestParams(voiceForm);

  assert.equal(params.CallSid, 'CA123');
  assert.equal(params.CallStatus, 'ringing');
  assert.equal(params.FromCity, 'SPRINGFIELD');
  assert.equal(params.ToZip, undefined);
  assert.deepEqual(params.extra, { Digits: '42' });
  assert.equal(getExtra(params, 'Digits'), '42');
  assert.equal(getExtra(params, 'CallSid'), undefined);
  assert.equal(getExtra(params, 'toString'), undefined);
  assert.equal(isNoAnswer(params), false);
});

test('form fields named like object builtins stay in extras', async () => {
  const { getExtra, parseVoiceRequestParams } = await import('../src/webhooks/requestParams');

  const params = parseVoiceRequestParams({ ...voiceForm, constructor: 'x', toString: 'y' });

  assert.deepEqual(params.extra, { Digits: '42', constructor: 'x', toString: 'y' });
  assert.equal(getExtra(params, 'constructor'), 'x');
});

test('isNoAnswer is true only for no-answer', async () => {
  const { isNoAnswer, parseVoiceRequestParams } = await import('../src/webhooks/requestParams');

  assert.equal(isNoAnswer(parseVoiceRequestParams({ ...voiceForm, CallStatus: 'no-answer' })), true);
  assert.equal(isNoAnswer(parseVoiceRequestParams({ ...voiceForm, CallStatus: 'busy' })), false);
});

test('a voice post without CallSid is a DeserializationError', async () => {
  const { parseVoiceRequestParams } = await import('../src/webhooks/requestParams');
  const { DeserializationError } = await import('../src/twilio/errors');

  const { CallSid: _dropped, ...rest } = voiceForm;

  assert.throws(
    () => parseVoiceRequestParams(rest),
    (error: unknown) => {
      assert.ok(error instanceof DeserializationError);
      assert.deepEqual(error.issues, ['CallSid: Required']);
      return true;
    },
  );
});

test('conference parameters coerce numbers and booleans from form strings', async () => {
  const { isConferenceEnd, parseConferenceRequestParams } = await import('../src/webhooks/requestParams');

  const params = parseConferenceRequestParams({
    ConferenceSid: 'CF1',
    FriendlyName: 'standup',
    AccountSid: 'AC123',
    SequenceNumber: '7',
    Timestamp: 'Tue, 01 Oct 2024 10:00:00 +0000',
    StatusCallbackEvent: 'participant-join',
    CallSid: 'CA9',
    Muted: 'false',
    Hold: 'true',
    Duration: '',
  });

  assert.equal(params.SequenceNumber, 7);
  assert.equal(params.Muted, false);
  assert.equal(params.Hold, true);
  assert.equal(params.Coaching, undefined);
  assert.equal(params.Duration, undefined);
  assert.equal(isConferenceEnd(params), false);
});

test('isConferenceEnd detects the conference-end event', async () => {
  const { isConferenceEnd, parseConferenceRequestParams } = await import('../src/webhooks/requestParams');

  const params = parseConferenceRequestParams({
    ConferenceSid: 'CF1',
    FriendlyName: 'standup',
    AccountSid: 'AC123',
    SequenceNumber: '12',
    Timestamp: 'Tue, 01 Oct 2024 10:30:00 +0000',
    StatusCallbackEvent: 'conference-end',
    CallSidEndingConference: 'CA9',
  });

  assert.equal(isConferenceEnd(params), true);
  assert.equal(params.CallSidEndingConference, 'CA9');
});

test('AMD parameters accept the documented answered-by values', async () => {
  const { parseAmdRequestParams } = await import('../src/webhooks/requestParams');
  const { DeserializationError } = await import('../src/twilio/errors');

  const params = parseAmdRequestParams({ CallSid: 'CA1', AccountSid: 'AC123', AnsweredBy: 'machine_end_beep' });
  assert.equal(params.AnsweredBy, 'machine_end_beep');

  assert.throws(
    () => parseAmdRequestParams({ CallSid: 'CA1', AccountSid: 'AC123', AnsweredBy: 'robot' }),
    DeserializationError,
  );
});
