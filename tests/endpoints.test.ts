import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('CreateStream encodes custom parameters as numbered pairs', async () => {
  const { CreateStream } = await import('../src/twilio/endpoints/streams');

  const endpoint = new CreateStream('AC123', 'CA456', {
    url: 'wss://media.example.test/stream',
    track: 'inbound_track',
    parameters: { tenant: 'acme', lang: 'en' },
  });

  assert.equal(endpoint.path, '/2010-04-01/Accounts/AC123/Calls/CA456/Streams.json');
  assert.deepEqual(endpoint.requestBody(), {
    kind: 'form',
    params: [
      ['Url', 'wss://media.example.test/stream'],
      ['Track', 'inbound_track'],
      ['Parameter1.Name', 'tenant'],
      ['Parameter1.Value', 'acme'],
      ['Parameter2.Name', 'lang'],
      ['Parameter2.Value', 'en'],
    ],
  });
});

test('StopStream posts Status=stopped to the stream resource', async () => {
  const { StopStream } = await import('../src/twilio/endpoints/streams');

  const endpoint = new StopStream('AC123', 'CA456', 'MZ789');

  assert.equal(endpoint.name, 'stop_stream');
  assert.equal(endpoint.method, 'POST');
  assert.equal(endpoint.path, '/2010-04-01/Accounts/AC123/Calls/CA456/Streams/MZ789.json');
  assert.deepEqual(endpoint.requestBody(), { kind: 'form', params: [['Status', 'stopped']] });
});

test('conference endpoints resolve their paths', async () => {
  const { FetchConference, ListConferences, UpdateConference } = await import(
    '../src/twilio/endpoints/conferences'
  );

  assert.equal(new FetchConference('AC123', 'CF1').path, '/2010-04-01/Accounts/AC123/Conferences/CF1.json');

  const list = new ListConferences('AC123', { friendlyName: 'standup', status: 'in-progress' });
  assert.equal(list.path, '/2010-04-01/Accounts/AC123/Conferences.json');
  assert.deepEqual(list.queryParams(), [
    ['FriendlyName', 'standup'],
    ['Status', 'in-progress'],
  ]);

  const update = new UpdateConference('AC123', 'CF1', { status: 'completed' });
  assert.equal(update.method, 'POST');
  assert.deepEqual(update.requestBody(), { kind: 'form', params: [['Status', 'completed']] });
});

test('participant endpoints use the conference and call SIDs', async () => {
  const {
    CreateParticipant,
    DeleteParticipant,
    FetchParticipant,
    ListParticipants,
    UpdateParticipant,
  } = await import('../src/twilio/endpoints/conferences');

  const create = new CreateParticipant('AC123', 'CF1', {
    from: '+15557654321',
    to: '+15551234567',
    muted: true,
    startConferenceOnEnter: false,
  });
  assert.equal(create.path, '/2010-04-01/Accounts/AC123/Conferences/CF1/Participants.json');
  assert.deepEqual(create.requestBody(), {
    kind: 'form',
    params: [
      ['From', '+15557654321'],
      ['To', '+15551234567'],
      ['Muted', 'true'],
      ['StartConferenceOnEnter', 'false'],
    ],
  });

  const participantPath = '/2010-04-01/Accounts/AC123/Conferences/CF1/Participants/CA9.json';
  assert.equal(new FetchParticipant('AC123', 'CF1', 'CA9').path, participantPath);
  assert.deepEqual(new UpdateParticipant('AC123', 'CF1', 'CA9', { hold: true }).requestBody(), {
    kind: 'form',
    params: [['Hold', 'true']],
  });

  const remove = new DeleteParticipant('AC123', 'CF1', 'CA9');
  assert.equal(remove.method, 'DELETE');
  assert.equal(remove.path, participantPath);
  assert.deepEqual(remove.requestBody(), { kind: 'empty' });

  assert.deepEqual(new ListParticipants('AC123', 'CF1', { muted: false }).queryParams(), [['Muted', 'false']]);
});

test('account endpoints address the account by SID', async () => {
  const { CreateAccount, FetchAccount, ListAccounts, UpdateAccount } = await import(
    '../src/twilio/endpoints/accounts'
  );

  const create = new CreateAccount();
  assert.equal(create.path, '/2010-04-01/Accounts.json');
  assert.deepEqual(create.requestBody(), { kind: 'form', params: [] });

  assert.equal(new FetchAccount('AC123').path, '/2010-04-01/Accounts/AC123.json');
  assert.deepEqual(new ListAccounts({ status: 'active' }).queryParams(), [['Status', 'active']]);
  assert.deepEqual(new UpdateAccount('AC123', { friendlyName: 'Support line', status: 'suspended' }).requestBody(), {
    kind: 'form',
    params: [
      ['FriendlyName', 'Support line'],
      ['Status', 'suspended'],
    ],
  });
});

test('application endpoints share one body encoding for create and update', async () => {
  const {
    CreateApplication,
    DeleteApplication,
    FetchApplication,
    ListApplications,
    UpdateApplication,
  } = await import('../src/twilio/endpoints/applications');

  const body = { friendlyName: 'IVR', voiceUrl: 'https://voice.example.test/voice/incoming', voiceMethod: 'POST' as const };
  const expected = {
    kind: 'form',
    params: [
      ['FriendlyName', 'IVR'],
      ['VoiceUrl', 'https://voice.example.test/voice/incoming'],
      ['VoiceMethod', 'POST'],
    ],
  };

  const create = new CreateApplication('AC123', body);
  assert.equal(create.path, '/2010-04-01/Accounts/AC123/Applications.json');
  assert.deepEqual(create.requestBody(), expected);

  const update = new UpdateApplication('AC123', 'AP1', body);
  assert.equal(update.path, '/2010-04-01/Accounts/AC123/Applications/AP1.json');
  assert.deepEqual(update.requestBody(), expected);

  assert.equal(new FetchApplication('AC123', 'AP1').method, 'GET');
  assert.equal(new DeleteApplication('AC123', 'AP1').method, 'DELETE');
  assert.deepEqual(new ListApplications('AC123', { friendlyName: 'IVR' }).queryParams(), [['FriendlyName', 'IVR']]);
});
