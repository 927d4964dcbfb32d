import { z } from 'zod';

export const ApiVersionSchema = z.enum(['2010-04-01', '2008-08-01']);
export type ApiVersion = z.infer<typeof ApiVersionSchema>;

export const CallStatusSchema = z.enum([
  'queued',
  'ringing',
  'in-progress',
  'canceled',
  'completed',
  'failed',
  'busy',
  'no-answer',
]);
export type CallStatus = z.infer<typeof CallStatusSchema>;

/** HTTP verb the remote API uses when it calls back into a webhook. */
export type CallbackMethod = 'GET' | 'POST';

export type CallProgressEvent = 'initiated' | 'ringing' | 'answered' | 'completed';

export type RecordingStatusEvent = 'in-progress' | 'completed' | 'absent';

export type RecordingTrack = 'inbound' | 'outbound' | 'both';

export const SubresourceUrisSchema = z.record(z.string()).nullish();
