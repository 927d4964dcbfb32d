import { z } from 'zod';
import { RequestBody, TwilioEndpoint } from '../endpoint';
import { encodeForm, FormFieldNames, FormParams } from '../form';
import { PAGE_QUERY_NAMES, PageMetaSchema, PageQuery } from '../pagination';
import {
  ApiVersionSchema,
  CallbackMethod,
  CallProgressEvent,
  CallStatus,
  CallStatusSchema,
  RecordingStatusEvent,
  RecordingTrack,
  SubresourceUrisSchema,
} from '../types';

const CALLS_PATH = '/Accounts/{AccountSid}/Calls.json';
const CALL_PATH = '/Accounts/{AccountSid}/Calls/{Sid}.json';

export const CallResourceSchema = z.object({
  sid: z.string(),
  account_sid: z.string(),
  parent_call_sid: z.string().nullish(),
  date_created: z.string().nullish(),
  date_updated: z.string().nullish(),
  to: z.string(),
  to_formatted: z.string().nullish(),
  from: z.string(),
  from_formatted: z.string().nullish(),
  phone_number_sid: z.string().nullish(),
  status: CallStatusSchema.nullish(),
  start_time: z.string().nullish(),
  end_time: z.string().nullish(),
  duration: z.string().nullish(),
  price: z.string().nullish(),
  price_unit: z.string().nullish(),
  direction: z.string().nullish(),
  answered_by: z.string().nullish(),
  api_version: ApiVersionSchema.nullish(),
  forwarded_from: z.string().nullish(),
  group_sid: z.string().nullish(),
  caller_name: z.string().nullish(),
  queue_time: z.string().nullish(),
  trunk_sid: z.string().nullish(),
  uri: z.string(),
  subresource_uris: SubresourceUrisSchema,
  annotation: z.string().nullish(),
});

export type CallResource = z.infer<typeof CallResourceSchema>;

export const CallPageSchema = PageMetaSchema.extend({
  calls: z.array(CallResourceSchema),
});

export type CallPage = z.infer<typeof CallPageSchema>;

/**
 * Every field `CreateCall` understands. `url`, `twiml` and `applicationSid`
 * are alternative sources of call-control instructions; `CreateCallBody`
 * requires exactly one of them.
 */
export interface CreateCallParams {
  to: string;
  from: string;
  url?: string;
  twiml?: string;
  applicationSid?: string;
  method?: CallbackMethod;
  fallbackUrl?: string;
  fallbackMethod?: CallbackMethod;
  statusCallback?: string;
  statusCallbackMethod?: CallbackMethod;
  /** Progress events posted to `statusCallback`; the remote default is `completed` only. */
  statusCallbackEvent?: CallProgressEvent[];
  sendDigits?: string;
  timeout?: number;
  record?: boolean;
  recordingChannels?: 'mono' | 'dual';
  recordingStatusCallback?: string;
  recordingStatusCallbackMethod?: CallbackMethod;
  recordingStatusCallbackEvent?: RecordingStatusEvent[];
  recordingTrack?: RecordingTrack;
  sipAuthUsername?: string;
  sipAuthPassword?: string;
  machineDetection?: 'Enable' | 'DetectMessageEnd';
  machineDetectionTimeout?: number;
  machineDetectionSpeechThreshold?: number;
  machineDetectionSpeechEndThreshold?: number;
  machineDetectionSilenceTimeout?: number;
  trim?: 'trim-silence' | 'do-not-trim';
  callerId?: string;
  asyncAmd?: boolean;
  asyncAmdStatusCallback?: string;
  asyncAmdStatusCallbackMethod?: CallbackMethod;
  byoc?: string;
  callReason?: string;
  callToken?: string;
  timeLimit?: number;
}

type CallInstructions =
  | { url: string; twiml?: undefined; applicationSid?: undefined }
  | { twiml: string; url?: undefined; applicationSid?: undefined }
  | { applicationSid: string; url?: undefined; twiml?: undefined };

export type CreateCallBody = Omit<CreateCallParams, 'url' | 'twiml' | 'applicationSid'> & CallInstructions;

export const CREATE_CALL_FIELD_NAMES: FormFieldNames<CreateCallParams> = {
  to: 'To',
  from: 'From',
  url: 'Url',
  twiml: 'Twiml',
  applicationSid: 'ApplicationSid',
  method: 'Method',
  fallbackUrl: 'FallbackUrl',
  fallbackMethod: 'FallbackMethod',
  statusCallback: 'StatusCallback',
  statusCallbackMethod: 'StatusCallbackMethod',
  statusCallbackEvent: 'StatusCallbackEvent',
  sendDigits: 'SendDigits',
  timeout: 'Timeout',
  record: 'Record',
  recordingChannels: 'RecordingChannels',
  recordingStatusCallback: 'RecordingStatusCallback',
  recordingStatusCallbackMethod: 'RecordingStatusCallbackMethod',
  recordingStatusCallbackEvent: 'RecordingStatusCallbackEvent',
  recordingTrack: 'RecordingTrack',
  sipAuthUsername: 'SipAuthUsername',
  sipAuthPassword: 'SipAuthPassword',
  machineDetection: 'MachineDetection',
  machineDetectionTimeout: 'MachineDetectionTimeout',
  machineDetectionSpeechThreshold: 'MachineDetectionSpeechThreshold',
  machineDetectionSpeechEndThreshold: 'MachineDetectionSpeechEndThreshold',
  machineDetectionSilenceTimeout: 'MachineDetectionSilenceTimeout',
  trim: 'Trim',
  callerId: 'CallerId',
  asyncAmd: 'AsyncAmd',
  asyncAmdStatusCallback: 'AsyncAmdStatusCallback',
  asyncAmdStatusCallbackMethod: 'AsyncAmdStatusCallbackMethod',
  byoc: 'Byoc',
  callReason: 'CallReason',
  callToken: 'CallToken',
  timeLimit: 'TimeLimit',
};

/** The three required fields; every optional field is left unset. */
export function createCallBody(to: string, from: string, url: string): CreateCallBody {
  return { to, from, url };
}

export function encodeCreateCallBody(body: CreateCallBody): FormParams {
  const params: CreateCallParams = body;
  return encodeForm(params, CREATE_CALL_FIELD_NAMES);
}

export class CreateCall extends TwilioEndpoint<CreateCallBody, CallResource> {
  constructor(accountSid: string, body: CreateCallBody) {
    super('create_call', 'POST', CALLS_PATH, { AccountSid: accountSid }, body, CallResourceSchema);
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeCreateCallBody(this.body) };
  }
}

export class FetchCall extends TwilioEndpoint<undefined, CallResource> {
  constructor(accountSid: string, callSid: string) {
    super('fetch_call', 'GET', CALL_PATH, { AccountSid: accountSid, Sid: callSid }, undefined, CallResourceSchema);
  }
}

export interface ListCallsQuery extends PageQuery {
  to?: string;
  from?: string;
  parentCallSid?: string;
  status?: CallStatus;
  /** `YYYY-MM-DD`, in UTC. */
  startTime?: string;
  /** `YYYY-MM-DD`, in UTC. */
  endTime?: string;
}

const LIST_CALLS_QUERY_NAMES: FormFieldNames<ListCallsQuery> = {
  ...PAGE_QUERY_NAMES,
  to: 'To',
  from: 'From',
  parentCallSid: 'ParentCallSid',
  status: 'Status',
  startTime: 'StartTime',
  endTime: 'EndTime',
};

export class ListCalls extends TwilioEndpoint<undefined, CallPage> {
  private readonly query: ListCallsQuery;

  constructor(accountSid: string, query: ListCallsQuery = {}) {
    super('list_calls', 'GET', CALLS_PATH, { AccountSid: accountSid }, undefined, CallPageSchema);
    this.query = query;
  }

  public override queryParams(): FormParams {
    return encodeForm(this.query, LIST_CALLS_QUERY_NAMES);
  }
}

export interface UpdateCallBody {
  url?: string;
  method?: CallbackMethod;
  twiml?: string;
  /** `canceled` ends a queued or ringing call; `completed` hangs up an answered one. */
  status?: 'canceled' | 'completed';
  fallbackUrl?: string;
  fallbackMethod?: CallbackMethod;
  statusCallback?: string;
  statusCallbackMethod?: CallbackMethod;
  timeLimit?: number;
}

const UPDATE_CALL_FIELD_NAMES: FormFieldNames<UpdateCallBody> = {
  url: 'Url',
  method: 'Method',
  twiml: 'Twiml',
  status: 'Status',
  fallbackUrl: 'FallbackUrl',
  fallbackMethod: 'FallbackMethod',
  statusCallback: 'StatusCallback',
  statusCallbackMethod: 'StatusCallbackMethod',
  timeLimit: 'TimeLimit',
};

export class UpdateCall extends TwilioEndpoint<UpdateCallBody, CallResource> {
  constructor(accountSid: string, callSid: string, body: UpdateCallBody) {
    super('update_call', 'POST', CALL_PATH, { AccountSid: accountSid, Sid: callSid }, body, CallResourceSchema);
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeForm(this.body, UPDATE_CALL_FIELD_NAMES) };
  }
}
