import { createCallBody, CreateCall } from '../src/twilio/endpoints/calls';
import { TwilioClient } from '../src/twilio/client';

const DEMO_TWIML_URL = 'http://demo.twilio.com/docs/voice.xml';

async function main(): Promise<void> {
  const to = process.argv[2];
  if (!to) {
    throw new Error('usage: create-call <to-number> [from-number]');
  }

  const client = TwilioClient.fromEnvironment();
  const from = process.argv[3] ?? client.phoneNumber();
  if (!from) {
    throw new Error('no caller number: pass one or set TWILIO_PHONE_NUMBER');
  }

  const call = await client.hit(new CreateCall(client.accountSid(), createCallBody(to, from, DEMO_TWIML_URL)));
  process.stdout.write(`created call ${call.sid} (${call.status ?? 'unknown status'})\n`);
}

main().catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
