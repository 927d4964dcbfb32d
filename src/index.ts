export { TwilioClient } from './twilio/client';
export type { HitOptions, TwilioClientOptions } from './twilio/client';
export { API_VERSION, resolvePath, TwilioEndpoint } from './twilio/endpoint';
export type { HttpMethod, PathParams, RequestBody, ResponseSchema } from './twilio/endpoint';
export {
  ApiError,
  ConfigurationError,
  DeserializationError,
  InvalidArgumentError,
  TransportError,
  TwilioClientError,
  TwimlError,
} from './twilio/errors';
export type { TwilioErrorKind, TwimlErrorReason } from './twilio/errors';
export { encodeForm, formParamNames, formToSearchParams } from './twilio/form';
export type { FormFieldNames, FormParams } from './twilio/form';
export type { PageMeta, PageQuery } from './twilio/pagination';
export * from './twilio/types';
export * from './twilio/endpoints/calls';
export * from './twilio/endpoints/streams';
export * from './twilio/endpoints/conferences';
export * from './twilio/endpoints/accounts';
export * from './twilio/endpoints/applications';
export * from './twiml/voiceResponse';
export * from './webhooks/requestParams';
export * from './media/streamMessages';
export { attachMediaStreamServer, MEDIA_STREAM_PATH, MediaStreamSession } from './media/streamServer';
export type { MediaStreamHandlers, MediaStreamServerOptions } from './media/streamServer';
export { loadServerEnv, loadTwilioEnv } from './env';
export type { ServerEnv, TwilioEnv } from './env';
export { buildServer } from './server';
