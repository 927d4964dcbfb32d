import { z } from 'zod';
import { DeserializationError } from '../twilio/errors';
import { ApiVersionSchema, CallStatusSchema } from '../twilio/types';
import { emptyToUndefined, stringToBoolean } from '../util/preprocess';

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());
const optionalBoolean = z.preprocess(stringToBoolean, z.boolean().optional());
const optionalCount = z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().optional());

const VOICE_REQUEST_SHAPE = {
  CallSid: z.string().min(1),
  AccountSid: z.string().min(1),
  From: z.string(),
  To: z.string(),
  CallStatus: CallStatusSchema,
  ApiVersion: ApiVersionSchema,
  Direction: z.string(),
  ForwardedFrom: optionalString,
  CallerName: optionalString,
  ParentCallSid: optionalString,
  CallToken: optionalString,
  FromCity: optionalString,
  FromState: optionalString,
  FromZip: optionalString,
  FromCountry: optionalString,
  ToCity: optionalString,
  ToState: optionalString,
  ToZip: optionalString,
  ToCountry: optionalString,
};

const VoiceRequestFieldsSchema = z.object(VOICE_REQUEST_SHAPE);

/**
 * Parameters posted with every voice webhook. Fields this type does not name
 * (e.g. `Digits`, `SpeechResult`, custom parameters) land in `extra`.
 */
export type VoiceRequestParams = z.infer<typeof VoiceRequestFieldsSchema> & {
  extra: Record<string, string>;
};

export const ConferenceEventSchema = z.enum([
  'conference-end',
  'conference-start',
  'participant-leave',
  'participant-join',
  'participant-mute',
  'participant-unmute',
  'participant-hold',
  'participant-unhold',
  'participant-modify',
  'participant-speech-start',
  'participant-speech-stop',
  'announcement-end',
  'announcement-fail',
]);

export type ConferenceEvent = z.infer<typeof ConferenceEventSchema>;

export const ConferenceRequestParamsSchema = z.object({
  ConferenceSid: z.string().min(1),
  FriendlyName: z.string(),
  AccountSid: z.string().min(1),
  SequenceNumber: z.coerce.number().int().nonnegative(),
  Timestamp: z.string(),
  StatusCallbackEvent: z.preprocess(emptyToUndefined, ConferenceEventSchema.optional()),
  CallSid: optionalString,
  Muted: optionalBoolean,
  Hold: optionalBoolean,
  Coaching: optionalBoolean,
  EndConferenceOnExit: optionalBoolean,
  StartConferenceOnEnter: optionalBoolean,
  CallSidEndingConference: optionalString,
  ParticipantLabelEndingConference: optionalString,
  Reason: optionalString,
  ReasonAnnouncementFailed: optionalString,
  AnnounceUrl: optionalString,
  ParticipationCallStatus: optionalString,
  EventName: optionalString,
  RecordingUrl: optionalString,
  Duration: optionalCount,
  RecordingFileSize: optionalCount,
});

export type ConferenceRequestParams = z.infer<typeof ConferenceRequestParamsSchema>;

export const AnsweredBySchema = z.enum([
  'machine_start',
  'human',
  'fax',
  'unknown',
  'machine_end_beep',
  'machine_end_silence',
  'machine_end_other',
]);

export type AnsweredBy = z.infer<typeof AnsweredBySchema>;

/** Answering-machine-detection callback. */
export const AmdRequestParamsSchema = z.object({
  CallSid: z.string().min(1),
  AccountSid: z.string().min(1),
  AnsweredBy: AnsweredBySchema,
});

export type AmdRequestParams = z.infer<typeof AmdRequestParamsSchema>;

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, subject: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw DeserializationError.fromZod(subject, parsed.error);
  }
  return parsed.data;
}

function collectExtras(input: unknown): Record<string, string> {
  const extra: Record<string, string> = {};
  if (typeof input !== 'object' || input === null) {
    return extra;
  }

  for (const [key, value] of Object.entries(input)) {
    if (!Object.prototype.hasOwnProperty.call(VOICE_REQUEST_SHAPE, key) && typeof value === 'string') {
      extra[key] = value;
    }
  }
  return extra;
}

export function parseVoiceRequestParams(input: unknown): VoiceRequestParams {
  const fields = parseWith(VoiceRequestFieldsSchema, input, 'voice request parameters');
  return { ...fields, extra: collectExtras(input) };
}

export function parseConferenceRequestParams(input: unknown): ConferenceRequestParams {
  return parseWith(ConferenceRequestParamsSchema, input, 'conference request parameters');
}

export function parseAmdRequestParams(input: unknown): AmdRequestParams {
  return parseWith(AmdRequestParamsSchema, input, 'AMD request parameters');
}

export function isNoAnswer(params: VoiceRequestParams): boolean {
  return params.CallStatus === 'no-answer';
}

export function isConferenceEnd(params: ConferenceRequestParams): boolean {
  return params.StatusCallbackEvent === 'conference-end';
}

export function getExtra(params: VoiceRequestParams, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(params.extra, key) ? params.extra[key] : undefined;
}
