import { z } from 'zod';
import { RequestBody, TwilioEndpoint } from '../endpoint';
import { encodeForm, FormFieldNames, FormParams } from '../form';
import { PAGE_QUERY_NAMES, PageMetaSchema, PageQuery } from '../pagination';
import {
  ApiVersionSchema,
  CallbackMethod,
  CallProgressEvent,
  RecordingStatusEvent,
  RecordingTrack,
  SubresourceUrisSchema,
} from '../types';

const CONFERENCES_PATH = '/Accounts/{AccountSid}/Conferences.json';
const CONFERENCE_PATH = '/Accounts/{AccountSid}/Conferences/{Sid}.json';
const PARTICIPANTS_PATH = '/Accounts/{AccountSid}/Conferences/{ConferenceSid}/Participants.json';
const PARTICIPANT_PATH = '/Accounts/{AccountSid}/Conferences/{ConferenceSid}/Participants/{CallSid}.json';

export const ConferenceResourceSchema = z.object({
  sid: z.string(),
  account_sid: z.string(),
  date_created: z.string().nullish(),
  date_updated: z.string().nullish(),
  api_version: ApiVersionSchema,
  friendly_name: z.string().nullish(),
  region: z.string().nullish(),
  status: z.string(),
  uri: z.string(),
  subresource_uris: SubresourceUrisSchema,
  reason_conference_ended: z.string().nullish(),
  call_sid_ending_conference: z.string().nullish(),
});

export type ConferenceResource = z.infer<typeof ConferenceResourceSchema>;

export const ConferencePageSchema = PageMetaSchema.extend({
  conferences: z.array(ConferenceResourceSchema),
});

export type ConferencePage = z.infer<typeof ConferencePageSchema>;

export const ParticipantResourceSchema = z.object({
  account_sid: z.string(),
  conference_sid: z.string(),
  call_sid: z.string(),
  label: z.string().nullish(),
  call_sid_to_coach: z.string().nullish(),
  coaching: z.boolean().nullish(),
  date_created: z.string().nullish(),
  date_updated: z.string().nullish(),
  end_conference_on_exit: z.boolean().nullish(),
  muted: z.boolean().nullish(),
  hold: z.boolean().nullish(),
  start_conference_on_enter: z.boolean().nullish(),
  status: z.string().nullish(),
  queue_time: z.string().nullish(),
  uri: z.string(),
});

export type ParticipantResource = z.infer<typeof ParticipantResourceSchema>;

export const ParticipantPageSchema = PageMetaSchema.extend({
  participants: z.array(ParticipantResourceSchema),
});

export type ParticipantPage = z.infer<typeof ParticipantPageSchema>;

export class FetchConference extends TwilioEndpoint<undefined, ConferenceResource> {
  constructor(accountSid: string, conferenceSid: string) {
    super(
      'fetch_conference',
      'GET',
      CONFERENCE_PATH,
      { AccountSid: accountSid, Sid: conferenceSid },
      undefined,
      ConferenceResourceSchema,
    );
  }
}

export interface ListConferencesQuery extends PageQuery {
  friendlyName?: string;
  status?: 'init' | 'in-progress' | 'completed';
  dateCreated?: string;
  dateUpdated?: string;
}

const LIST_CONFERENCES_QUERY_NAMES: FormFieldNames<ListConferencesQuery> = {
  ...PAGE_QUERY_NAMES,
  friendlyName: 'FriendlyName',
  status: 'Status',
  dateCreated: 'DateCreated',
  dateUpdated: 'DateUpdated',
};

export class ListConferences extends TwilioEndpoint<undefined, ConferencePage> {
  private readonly query: ListConferencesQuery;

  constructor(accountSid: string, query: ListConferencesQuery = {}) {
    super('list_conferences', 'GET', CONFERENCES_PATH, { AccountSid: accountSid }, undefined, ConferencePageSchema);
    this.query = query;
  }

  public override queryParams(): FormParams {
    return encodeForm(this.query, LIST_CONFERENCES_QUERY_NAMES);
  }
}

export interface UpdateConferenceBody {
  /** Only `completed` is accepted: it ends the conference. */
  status?: 'completed';
  announceUrl?: string;
  announceMethod?: CallbackMethod;
}

const UPDATE_CONFERENCE_FIELD_NAMES: FormFieldNames<UpdateConferenceBody> = {
  status: 'Status',
  announceUrl: 'AnnounceUrl',
  announceMethod: 'AnnounceMethod',
};

export class UpdateConference extends TwilioEndpoint<UpdateConferenceBody, ConferenceResource> {
  constructor(accountSid: string, conferenceSid: string, body: UpdateConferenceBody) {
    super(
      'update_conference',
      'POST',
      CONFERENCE_PATH,
      { AccountSid: accountSid, Sid: conferenceSid },
      body,
      ConferenceResourceSchema,
    );
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeForm(this.body, UPDATE_CONFERENCE_FIELD_NAMES) };
  }
}

export interface CreateParticipantBody {
  from: string;
  to: string;
  label?: string;
  statusCallback?: string;
  statusCallbackMethod?: CallbackMethod;
  statusCallbackEvent?: CallProgressEvent[];
  timeout?: number;
  record?: boolean;
  muted?: boolean;
  beep?: 'true' | 'false' | 'onEnter' | 'onExit';
  startConferenceOnEnter?: boolean;
  endConferenceOnExit?: boolean;
  waitUrl?: string;
  waitMethod?: CallbackMethod;
  earlyMedia?: boolean;
  maxParticipants?: number;
  conferenceRecord?: 'true' | 'false' | 'record-from-start' | 'do-not-record';
  conferenceTrim?: 'trim-silence' | 'do-not-trim';
  conferenceStatusCallback?: string;
  conferenceStatusCallbackMethod?: CallbackMethod;
  conferenceStatusCallbackEvent?: string[];
  recordingChannels?: 'mono' | 'dual';
  recordingStatusCallback?: string;
  recordingStatusCallbackMethod?: CallbackMethod;
  recordingStatusCallbackEvent?: RecordingStatusEvent[];
  sipAuthUsername?: string;
  sipAuthPassword?: string;
  region?: string;
  conferenceRecordingStatusCallback?: string;
  conferenceRecordingStatusCallbackMethod?: CallbackMethod;
  conferenceRecordingStatusCallbackEvent?: RecordingStatusEvent[];
  coaching?: boolean;
  callSidToCoach?: string;
  jitterBufferSize?: 'off' | 'small' | 'medium' | 'large';
  byoc?: string;
  callerId?: string;
  callReason?: string;
  recordingTrack?: RecordingTrack;
  timeLimit?: number;
  machineDetection?: 'Enable' | 'DetectMessageEnd';
  machineDetectionTimeout?: number;
  machineDetectionSpeechThreshold?: number;
  machineDetectionSpeechEndThreshold?: number;
  machineDetectionSilenceTimeout?: number;
  amdStatusCallback?: string;
  amdStatusCallbackMethod?: CallbackMethod;
  trim?: 'trim-silence' | 'do-not-trim';
  callToken?: string;
}

const CREATE_PARTICIPANT_FIELD_NAMES: FormFieldNames<CreateParticipantBody> = {
  from: 'From',
  to: 'To',
  label: 'Label',
  statusCallback: 'StatusCallback',
  statusCallbackMethod: 'StatusCallbackMethod',
  statusCallbackEvent: 'StatusCallbackEvent',
  timeout: 'Timeout',
  record: 'Record',
  muted: 'Muted',
  beep: 'Beep',
  startConferenceOnEnter: 'StartConferenceOnEnter',
  endConferenceOnExit: 'EndConferenceOnExit',
  waitUrl: 'WaitUrl',
  waitMethod: 'WaitMethod',
  earlyMedia: 'EarlyMedia',
  maxParticipants: 'MaxParticipants',
  conferenceRecord: 'ConferenceRecord',
  conferenceTrim: 'ConferenceTrim',
  conferenceStatusCallback: 'ConferenceStatusCallback',
  conferenceStatusCallbackMethod: 'ConferenceStatusCallbackMethod',
  conferenceStatusCallbackEvent: 'ConferenceStatusCallbackEvent',
  recordingChannels: 'RecordingChannels',
  recordingStatusCallback: 'RecordingStatusCallback',
  recordingStatusCallbackMethod: 'RecordingStatusCallbackMethod',
  recordingStatusCallbackEvent: 'RecordingStatusCallbackEvent',
  sipAuthUsername: 'SipAuthUsername',
  sipAuthPassword: 'SipAuthPassword',
  region: 'Region',
  conferenceRecordingStatusCallback: 'ConferenceRecordingStatusCallback',
  conferenceRecordingStatusCallbackMethod: 'ConferenceRecordingStatusCallbackMethod',
  conferenceRecordingStatusCallbackEvent: 'ConferenceRecordingStatusCallbackEvent',
  coaching: 'Coaching',
  callSidToCoach: 'CallSidToCoach',
  jitterBufferSize: 'JitterBufferSize',
  byoc: 'Byoc',
  callerId: 'CallerId',
  callReason: 'CallReason',
  recordingTrack: 'RecordingTrack',
  timeLimit: 'TimeLimit',
  machineDetection: 'MachineDetection',
  machineDetectionTimeout: 'MachineDetectionTimeout',
  machineDetectionSpeechThreshold: 'MachineDetectionSpeechThreshold',
  machineDetectionSpeechEndThreshold: 'MachineDetectionSpeechEndThreshold',
  machineDetectionSilenceTimeout: 'MachineDetectionSilenceTimeout',
  amdStatusCallback: 'AmdStatusCallback',
  amdStatusCallbackMethod: 'AmdStatusCallbackMethod',
  trim: 'Trim',
  callToken: 'CallToken',
};

export class CreateParticipant extends TwilioEndpoint<CreateParticipantBody, ParticipantResource> {
  constructor(accountSid: string, conferenceSid: string, body: CreateParticipantBody) {
    super(
      'create_participant',
      'POST',
      PARTICIPANTS_PATH,
      { AccountSid: accountSid, ConferenceSid: conferenceSid },
      body,
      ParticipantResourceSchema,
    );
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeForm(this.body, CREATE_PARTICIPANT_FIELD_NAMES) };
  }
}

export class FetchParticipant extends TwilioEndpoint<undefined, ParticipantResource> {
  constructor(accountSid: string, conferenceSid: string, callSid: string) {
    super(
      'fetch_participant',
      'GET',
      PARTICIPANT_PATH,
      { AccountSid: accountSid, ConferenceSid: conferenceSid, CallSid: callSid },
      undefined,
      ParticipantResourceSchema,
    );
  }
}

export interface ListParticipantsQuery extends PageQuery {
  muted?: boolean;
  hold?: boolean;
  coaching?: boolean;
  label?: string;
}

const LIST_PARTICIPANTS_QUERY_NAMES: FormFieldNames<ListParticipantsQuery> = {
  ...PAGE_QUERY_NAMES,
  muted: 'Muted',
  hold: 'Hold',
  coaching: 'Coaching',
  label: 'Label',
};

export class ListParticipants extends TwilioEndpoint<undefined, ParticipantPage> {
  private readonly query: ListParticipantsQuery;

  constructor(accountSid: string, conferenceSid: string, query: ListParticipantsQuery = {}) {
    super(
      'list_participants',
      'GET',
      PARTICIPANTS_PATH,
      { AccountSid: accountSid, ConferenceSid: conferenceSid },
      undefined,
      ParticipantPageSchema,
    );
    this.query = query;
  }

  public override queryParams(): FormParams {
    return encodeForm(this.query, LIST_PARTICIPANTS_QUERY_NAMES);
  }
}

export interface UpdateParticipantBody {
  muted?: boolean;
  hold?: boolean;
  holdUrl?: string;
  holdMethod?: CallbackMethod;
  announceUrl?: string;
  announceMethod?: CallbackMethod;
  waitUrl?: string;
  waitMethod?: CallbackMethod;
  beepOnExit?: boolean;
  endConferenceOnExit?: boolean;
  coaching?: boolean;
  callSidToCoach?: string;
}

const UPDATE_PARTICIPANT_FIELD_NAMES: FormFieldNames<UpdateParticipantBody> = {
  muted: 'Muted',
  hold: 'Hold',
  holdUrl: 'HoldUrl',
  holdMethod: 'HoldMethod',
  announceUrl: 'AnnounceUrl',
  announceMethod: 'AnnounceMethod',
  waitUrl: 'WaitUrl',
  waitMethod: 'WaitMethod',
  beepOnExit: 'BeepOnExit',
  endConferenceOnExit: 'EndConferenceOnExit',
  coaching: 'Coaching',
  callSidToCoach: 'CallSidToCoach',
};

export class UpdateParticipant extends TwilioEndpoint<UpdateParticipantBody, ParticipantResource> {
  constructor(accountSid: string, conferenceSid: string, callSid: string, body: UpdateParticipantBody) {
    super(
      'update_participant',
      'POST',
      PARTICIPANT_PATH,
      { AccountSid: accountSid, ConferenceSid: conferenceSid, CallSid: callSid },
      body,
      ParticipantResourceSchema,
    );
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeForm(this.body, UPDATE_PARTICIPANT_FIELD_NAMES) };
  }
}

/** Removes the participant; the API answers 204 with no body. */
export class DeleteParticipant extends TwilioEndpoint<undefined, void> {
  constructor(accountSid: string, conferenceSid: string, callSid: string) {
    super(
      'delete_participant',
      'DELETE',
      PARTICIPANT_PATH,
      { AccountSid: accountSid, ConferenceSid: conferenceSid, CallSid: callSid },
      undefined,
      z.void(),
    );
  }
}
