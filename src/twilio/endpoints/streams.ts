import { z } from 'zod';
import { RequestBody, TwilioEndpoint } from '../endpoint';
import { encodeForm, FormFieldNames, FormParams } from '../form';
import { CallbackMethod } from '../types';

export const StreamResourceSchema = z.object({
  sid: z.string(),
  account_sid: z.string(),
  call_sid: z.string(),
  name: z.string().nullish(),
  status: z.enum(['in-progress', 'stopped']),
  date_updated: z.string().nullish(),
  uri: z.string(),
});

export type StreamResource = z.infer<typeof StreamResourceSchema>;

export interface CreateStreamBody {
  /** `wss://` URL the media is forked to. */
  url: string;
  name?: string;
  track?: 'inbound_track' | 'outbound_track' | 'both_tracks';
  statusCallback?: string;
  statusCallbackMethod?: CallbackMethod;
  /** Sent as `Parameter1.Name` / `Parameter1.Value` pairs, in insertion order. */
  parameters?: Record<string, string>;
}

type CreateStreamFields = Omit<CreateStreamBody, 'parameters'>;

const CREATE_STREAM_FIELD_NAMES: FormFieldNames<CreateStreamFields> = {
  url: 'Url',
  name: 'Name',
  track: 'Track',
  statusCallback: 'StatusCallback',
  statusCallbackMethod: 'StatusCallbackMethod',
};

export function encodeCreateStreamBody(body: CreateStreamBody): FormParams {
  const { parameters, ...rest } = body;
  const fields: CreateStreamFields = rest;
  const params = encodeForm(fields, CREATE_STREAM_FIELD_NAMES);

  Object.entries(parameters ?? {}).forEach(([name, value], index) => {
    params.push([`Parameter${index + 1}.Name`, name]);
    params.push([`Parameter${index + 1}.Value`, value]);
  });

  return params;
}

export class CreateStream extends TwilioEndpoint<CreateStreamBody, StreamResource> {
  constructor(accountSid: string, callSid: string, body: CreateStreamBody) {
    super(
      'create_stream',
      'POST',
      '/Accounts/{AccountSid}/Calls/{CallSid}/Streams.json',
      { AccountSid: accountSid, CallSid: callSid },
      body,
      StreamResourceSchema,
    );
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeCreateStreamBody(this.body) };
  }
}

/** Stops a running stream; the only update the resource accepts. */
export class StopStream extends TwilioEndpoint<undefined, StreamResource> {
  constructor(accountSid: string, callSid: string, streamSid: string) {
    super(
      'stop_stream',
      'POST',
      '/Accounts/{AccountSid}/Calls/{CallSid}/Streams/{Sid}.json',
      { AccountSid: accountSid, CallSid: callSid, Sid: streamSid },
      undefined,
      StreamResourceSchema,
    );
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: [['Status', 'stopped']] };
  }
}
