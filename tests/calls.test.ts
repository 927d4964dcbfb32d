import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

const TO = '+15551234567';
const FROM = '+15557654321';
const DEMO_URL = 'http://demo.twilio.com/docs/voice.xml';

test('createCallBody sets exactly the three required fields', async () => {
  const { createCallBody } = await import('../src/twilio/endpoints/calls');

  const body = createCallBody(TO, FROM, DEMO_URL);

  assert.deepEqual(body, { to: TO, from: FROM, url: DEMO_URL });
});

test('demo call body encodes to To, From and Url only', async () => {
  const { createCallBody, encodeCreateCallBody } = await import('../src/twilio/endpoints/calls');

  assert.deepEqual(encodeCreateCallBody(createCallBody(TO, FROM, DEMO_URL)), [
    ['To', TO],
    ['From', FROM],
    ['Url', DEMO_URL],
  ]);
});

test('a literal body emits the required fields plus the optionals it sets', async () => {
  const { encodeCreateCallBody } = await import('../src/twilio/endpoints/calls');
  const { formParamNames } = await import('../src/twilio/form');

  const params = encodeCreateCallBody({
    to: TO,
    from: FROM,
    twiml: '<Response><Reject /></Response>',
    timeout: 30,
    record: false,
    statusCallbackEvent: ['initiated', 'answered'],
  });

  assert.deepEqual(formParamNames(params), [
    'To',
    'From',
    'Twiml',
    'StatusCallbackEvent',
    'StatusCallbackEvent',
    'Timeout',
    'Record',
  ]);
  assert.deepEqual(params[5], ['Timeout', '30']);
  assert.deepEqual(params[6], ['Record', 'false']);
});

test('CreateCall places the account SID in the path', async () => {
  const { CreateCall, createCallBody } = await import('../src/twilio/endpoints/calls');

  const endpoint = new CreateCall('AC123', createCallBody(TO, FROM, DEMO_URL));

  assert.equal(endpoint.name, 'create_call');
  assert.equal(endpoint.method, 'POST');
  assert.equal(endpoint.path, '/2010-04-01/Accounts/AC123/Calls.json');
  assert.deepEqual(endpoint.queryParams(), []);
  assert.equal(endpoint.requestBody().kind, 'form');
});

test('FetchCall has no body and a SID-qualified path', async () => {
  const { FetchCall } = await import('../src/twilio/endpoints/calls');

  const endpoint = new FetchCall('AC123', 'CA456');

  assert.equal(endpoint.method, 'GET');
  assert.equal(endpoint.path, '/2010-04-01/Accounts/AC123/Calls/CA456.json');
  assert.deepEqual(endpoint.requestBody(), { kind: 'empty' });
});

test('ListCalls encodes page and filter fields as query parameters', async () => {
  const { ListCalls } = await import('../src/twilio/endpoints/calls');

  const endpoint = new ListCalls('AC123', { status: 'completed', pageSize: 20, to: TO });

  assert.deepEqual(endpoint.queryParams(), [
    ['PageSize', '20'],
    ['To', TO],
    ['Status', 'completed'],
  ]);
  assert.deepEqual(endpoint.requestBody(), { kind: 'empty' });
});

test('UpdateCall sends only the fields it was given', async () => {
  const { UpdateCall } = await import('../src/twilio/endpoints/calls');

  const endpoint = new UpdateCall('AC123', 'CA456', { status: 'completed' });

  assert.equal(endpoint.path, '/2010-04-01/Accounts/AC123/Calls/CA456.json');
  assert.deepEqual(endpoint.requestBody(), { kind: 'form', params: [['Status', 'completed']] });
});

test('an empty path parameter is rejected before any request is built', async () => {
  const { FetchCall } = await import('../src/twilio/endpoints/calls');
  const { InvalidArgumentError } = await import('../src/twilio/errors');

  assert.throws(() => new FetchCall('AC123', ''), InvalidArgumentError);
  assert.throws(() => new FetchCall(' ', 'CA456'), /path parameter AccountSid must be a non-empty string/);
});

test('path parameters are URI-encoded', async () => {
  const { resolvePath } = await import('../src/twilio/endpoint');

  assert.equal(resolvePath('/Calls/{Sid}.json', { Sid: 'CA/../x' }), '/Calls/CA%2F..%2Fx.json');
});
