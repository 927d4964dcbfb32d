import { z } from 'zod';
import { DEFAULT_BASE_URL, loadTwilioEnv } from '../env';
import { log } from '../log';
import { incApiError, startApiTimer } from '../metrics';
import { VoiceResponse } from '../twiml/voiceResponse';
import { maskSecret, truncateForLog } from '../util/preprocess';
import { TwilioEndpoint } from './endpoint';
import { CallResource, CreateCall, UpdateCall } from './endpoints/calls';
import {
  ApiError,
  ConfigurationError,
  DeserializationError,
  TransportError,
  TwilioClientError,
} from './errors';
import { formToSearchParams } from './form';

const USER_AGENT = 'callwire/0.1.0';

const ClientConfigSchema = z
  .object({
    accountSid: z.string().refine((value) => value.trim() !== '', 'account SID must be non-empty'),
    authToken: z.string().refine((value) => value.trim() !== '', 'auth token must be non-empty'),
    apiKey: z.string().min(1).optional(),
    apiKeySecret: z.string().min(1).optional(),
    phoneNumber: z.string().min(1).optional(),
    baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  })
  .refine((value) => (value.apiKey === undefined) === (value.apiKeySecret === undefined), {
    message: 'apiKey and apiKeySecret must be given together',
    path: ['apiKey'],
  });

export type TwilioClientOptions = z.input<typeof ClientConfigSchema> & {
  /** Merged into every log line the client writes. */
  logContext?: Record<string, unknown>;
};

type ClientConfig = z.output<typeof ClientConfigSchema>;

export interface HitOptions {
  /** Forwarded to fetch; aborting rejects with the signal's reason, unchanged. */
  signal?: AbortSignal;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

// fetch rejects with `signal.reason`, which is a caller-supplied value when abort() was given one.
function isCallerAbort(err: unknown, signal: AbortSignal | undefined): boolean {
  return signal?.aborted === true && (isAbortError(err) || err === signal.reason);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parseJsonPayload(text: string): unknown {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DeserializationError(
      `response body is not valid JSON: ${truncateForLog(text, 200)}`,
      [],
      error,
    );
  }
}

/**
 * REST client for one account. Configuration is fixed at construction; the
 * `with*` methods return a new client, so one instance can be shared by any
 * number of concurrent callers.
 */
export class TwilioClient {
  private readonly config: Readonly<ClientConfig>;
  private readonly logContext: Record<string, unknown>;

  constructor(options: TwilioClientOptions) {
    const { logContext, ...rest } = options;
    const parsed = ClientConfigSchema.safeParse(rest);

    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid client configuration: ${issues.join(', ')}`, issues);
    }

    this.config = Object.freeze(parsed.data);
    this.logContext = logContext ?? {};
  }

  /** Reads TWILIO_* variables; throws ConfigurationError naming any that are missing. */
  public static fromEnvironment(source: NodeJS.ProcessEnv = process.env): TwilioClient {
    const env = loadTwilioEnv(source);
    return new TwilioClient({
      accountSid: env.TWILIO_ACCOUNT_SID,
      authToken: env.TWILIO_AUTH_TOKEN,
      apiKey: env.TWILIO_API_KEY,
      apiKeySecret: env.TWILIO_API_KEY_SECRET,
      phoneNumber: env.TWILIO_PHONE_NUMBER,
      baseUrl: env.TWILIO_BASE_URL,
    });
  }

  public accountSid(): string {
    return this.config.accountSid;
  }

  public authToken(): string {
    return this.config.authToken;
  }

  public phoneNumber(): string | undefined {
    return this.config.phoneNumber;
  }

  public baseUrl(): string {
    return this.config.baseUrl;
  }

  public withPhoneNumber(phoneNumber: string): TwilioClient {
    return new TwilioClient({ ...this.config, phoneNumber, logContext: this.logContext });
  }

  public withBaseUrl(baseUrl: string): TwilioClient {
    return new TwilioClient({ ...this.config, baseUrl, logContext: this.logContext });
  }

  public buildUrl<TBody, TResponse>(endpoint: TwilioEndpoint<TBody, TResponse>): string {
    const base = this.config.baseUrl.replace(/\/+$/, '');
    const query = formToSearchParams(endpoint.queryParams()).toString();
    return query === '' ? `${base}${endpoint.path}` : `${base}${endpoint.path}?${query}`;
  }

  /**
   * Sends one request for `endpoint` and decodes the success payload with the
   * endpoint's schema. Rejects with TransportError, ApiError or
   * DeserializationError; nothing is retried.
   */
  public async hit<TBody, TResponse>(
    endpoint: TwilioEndpoint<TBody, TResponse>,
    options: HitOptions = {},
  ): Promise<TResponse> {
    const url = this.buildUrl(endpoint);
    const requestBody = endpoint.requestBody();
    const stopTimer = startApiTimer(endpoint.name, endpoint.method);
    const startedAt = Date.now();
    const logFields = {
      endpoint: endpoint.name,
      method: endpoint.method,
      path: endpoint.path,
      ...this.logContext,
    };

    const headers: Record<string, string> = {
      Authorization: this.authorizationHeader(),
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    };

    let body: string | undefined;
    if (requestBody.kind === 'form') {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = formToSearchParams(requestBody.params).toString();
    }

    log.debug(
      {
        event: 'twilio_request',
        credential_fingerprint: maskSecret(this.config.apiKey ?? this.config.accountSid),
        ...logFields,
      },
      'twilio request',
    );

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, { method: endpoint.method, headers, body, signal: options.signal });
      text = await response.text();
    } catch (error) {
      stopTimer('error');
      if (isCallerAbort(error, options.signal)) {
        log.info({ event: 'twilio_request_aborted', ...logFields }, 'twilio request aborted');
        throw error;
      }
      incApiError(endpoint.name, 'transport');
      log.error({ event: 'twilio_request_error', err: error, ...logFields }, 'twilio request error');
      throw new TransportError(
        `${endpoint.method} ${endpoint.path} failed: ${errorMessage(error)}`,
        url,
        error,
      );
    }

    stopTimer(response.status);
    const durationMs = Date.now() - startedAt;

    if (!response.ok) {
      const apiError = ApiError.fromResponse(response.status, text);
      incApiError(endpoint.name, apiError.kind);
      log.warn(
        {
          event: 'twilio_request_failed',
          status: response.status,
          code: apiError.code,
          duration_ms: durationMs,
          body: truncateForLog(text, 1000),
          ...logFields,
        },
        'twilio request failed',
      );
      throw apiError;
    }

    try {
      const payload = parseJsonPayload(text);
      const result = endpoint.responseSchema.safeParse(payload);
      if (!result.success) {
        throw DeserializationError.fromZod(`${endpoint.name} response`, result.error);
      }

      log.info(
        { event: 'twilio_request_completed', status: response.status, duration_ms: durationMs, ...logFields },
        'twilio request completed',
      );
      return result.data;
    } catch (error) {
      if (error instanceof TwilioClientError) {
        incApiError(endpoint.name, error.kind);
        log.error(
          {
            event: 'twilio_response_invalid',
            status: response.status,
            err: error,
            body: truncateForLog(text, 1000),
            ...logFields,
          },
          'twilio response invalid',
        );
      }
      throw error;
    }
  }

  public async createCallWithUrl(to: string, from: string, url: string): Promise<CallResource> {
    return this.hit(new CreateCall(this.accountSid(), { to, from, url }));
  }

  public async createCallWithTwiml(
    to: string,
    from: string,
    twiml: string | VoiceResponse,
  ): Promise<CallResource> {
    const document = typeof twiml === 'string' ? twiml : twiml.toXml();
    return this.hit(new CreateCall(this.accountSid(), { to, from, twiml: document }));
  }

  public async updateCallWithUrl(callSid: string, url: string): Promise<CallResource> {
    return this.hit(new UpdateCall(this.accountSid(), callSid, { url }));
  }

  public async updateCallWithTwiml(callSid: string, twiml: string | VoiceResponse): Promise<CallResource> {
    const document = typeof twiml === 'string' ? twiml : twiml.toXml();
    return this.hit(new UpdateCall(this.accountSid(), callSid, { twiml: document }));
  }

  private authorizationHeader(): string {
    const { apiKey, apiKeySecret, accountSid, authToken } = this.config;
    const username = apiKey ?? accountSid;
    const password = apiKey !== undefined && apiKeySecret !== undefined ? apiKeySecret : authToken;
    return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
  }
}
