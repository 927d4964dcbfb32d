import { z } from 'zod';
import { truncateForLog } from '../util/preprocess';

export type TwilioErrorKind =
  | 'configuration'
  | 'invalid_argument'
  | 'transport'
  | 'api'
  | 'deserialization'
  | 'twiml';

/**
 * Base class for every error this package throws. Switch on `kind` (or use
 * `instanceof` on the subclasses) to tell them apart.
 */
export class TwilioClientError extends Error {
  public readonly kind: TwilioErrorKind;

  constructor(kind: TwilioErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = 'TwilioClientError';
  }
}

export class ConfigurationError extends TwilioClientError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('configuration', message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class InvalidArgumentError extends TwilioClientError {
  constructor(message: string) {
    super('invalid_argument', message);
    this.name = 'InvalidArgumentError';
  }
}

export class TransportError extends TwilioClientError {
  public readonly url: string;

  constructor(message: string, url: string, cause: unknown) {
    super('transport', message, { cause });
    this.name = 'TransportError';
    this.url = url;
  }
}

const ApiErrorPayloadSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  more_info: z.string().nullish(),
  status: z.number().int().optional(),
});

export type ApiErrorPayload = z.infer<typeof ApiErrorPayloadSchema>;

export class ApiError extends TwilioClientError {
  public readonly status: number;
  /** Remote error code, when the payload carried one. */
  public readonly code?: number;
  public readonly moreInfo?: string;
  public readonly responseBody: string;

  constructor(status: number, message: string, responseBody: string, payload?: ApiErrorPayload) {
    super('api', message);
    this.name = 'ApiError';
    this.status = status;
    this.code = payload?.code;
    this.moreInfo = payload?.more_info ?? undefined;
    this.responseBody = responseBody;
  }

  static fromResponse(status: number, rawBody: string): ApiError {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody);
    } catch {
      parsed = undefined;
    }

    const payload = ApiErrorPayloadSchema.safeParse(parsed);
    if (payload.success) {
      return new ApiError(
        status,
        `API error (${status}): ${payload.data.message}`,
        rawBody,
        payload.data,
      );
    }

    const detail = rawBody.trim() === '' ? 'empty response body' : truncateForLog(rawBody, 500);
    return new ApiError(status, `API error (${status}): ${detail}`, rawBody);
  }
}

export class DeserializationError extends TwilioClientError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super('deserialization', message, { cause });
    this.name = 'DeserializationError';
    this.issues = issues;
  }

  static fromZod(subject: string, error: z.ZodError): DeserializationError {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return new DeserializationError(`${subject} did not match the expected shape`, issues, error);
  }
}

export type TwimlErrorReason = 'invalid_websocket_url' | 'invalid_callback_url';

export class TwimlError extends TwilioClientError {
  public readonly reason: TwimlErrorReason;

  constructor(reason: TwimlErrorReason, message: string) {
    super('twiml', message);
    this.name = 'TwimlError';
    this.reason = reason;
  }
}
