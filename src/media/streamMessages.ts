import { z } from 'zod';
import { DeserializationError } from '../twilio/errors';

// Sequence numbers, chunks and timestamps arrive as decimal strings.
const NumericString = z.coerce.number().int().nonnegative();

const ConnectedMessageSchema = z.object({
  event: z.literal('connected'),
  protocol: z.string(),
  version: z.string(),
});

const StartMessageSchema = z.object({
  event: z.literal('start'),
  sequenceNumber: NumericString,
  streamSid: z.string(),
  start: z.object({
    accountSid: z.string(),
    streamSid: z.string(),
    callSid: z.string(),
    tracks: z.array(z.string()),
    customParameters: z.record(z.string()).default({}),
    mediaFormat: z.object({
      encoding: z.string(),
      sampleRate: z.number().int().positive(),
      channels: z.number().int().positive(),
    }),
  }),
});

const MediaMessageSchema = z.object({
  event: z.literal('media'),
  sequenceNumber: NumericString,
  streamSid: z.string(),
  media: z.object({
    track: z.string(),
    chunk: NumericString,
    timestamp: NumericString,
    payload: z.string(),
  }),
});

const MarkMessageSchema = z.object({
  event: z.literal('mark'),
  sequenceNumber: NumericString,
  streamSid: z.string(),
  mark: z.object({ name: z.string() }),
});

const StopMessageSchema = z.object({
  event: z.literal('stop'),
  sequenceNumber: NumericString,
  streamSid: z.string(),
  stop: z.object({
    accountSid: z.string(),
    callSid: z.string(),
  }),
});

const DtmfMessageSchema = z.object({
  event: z.literal('dtmf'),
  sequenceNumber: NumericString,
  streamSid: z.string(),
  dtmf: z.object({
    track: z.string(),
    digit: z.string(),
  }),
});

export const StreamMessageSchema = z.discriminatedUnion('event', [
  ConnectedMessageSchema,
  StartMessageSchema,
  MediaMessageSchema,
  MarkMessageSchema,
  StopMessageSchema,
  DtmfMessageSchema,
]);

export type StreamMessage = z.infer<typeof StreamMessageSchema>;
export type StartMessage = z.infer<typeof StartMessageSchema>;
export type MediaMessage = z.infer<typeof MediaMessageSchema>;
export type MarkMessage = z.infer<typeof MarkMessageSchema>;
export type StopMessage = z.infer<typeof StopMessageSchema>;
export type DtmfMessage = z.infer<typeof DtmfMessageSchema>;

/** Decodes one text frame from the media stream websocket. */
export function parseStreamMessage(raw: string): StreamMessage {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new DeserializationError('media stream message is not valid JSON', [], error);
  }

  const parsed = StreamMessageSchema.safeParse(json);
  if (!parsed.success) {
    throw DeserializationError.fromZod('media stream message', parsed.error);
  }
  return parsed.data;
}

export type OutboundMediaMessage = {
  event: 'media';
  streamSid: string;
  media: { payload: string };
};

export type OutboundMarkMessage = {
  event: 'mark';
  streamSid: string;
  mark: { name: string };
};

export type OutboundClearMessage = {
  event: 'clear';
  streamSid: string;
};

export type OutboundStreamMessage = OutboundMediaMessage | OutboundMarkMessage | OutboundClearMessage;

/** `payload` is base64 audio in the stream's media format (mu-law 8 kHz). */
export function mediaMessage(streamSid: string, payload: string | Buffer): OutboundMediaMessage {
  const encoded = typeof payload === 'string' ? payload : payload.toString('base64');
  return { event: 'media', streamSid, media: { payload: encoded } };
}

export function markMessage(streamSid: string, name: string): OutboundMarkMessage {
  return { event: 'mark', streamSid, mark: { name } };
}

export function clearMessage(streamSid: string): OutboundClearMessage {
  return { event: 'clear', streamSid };
}
