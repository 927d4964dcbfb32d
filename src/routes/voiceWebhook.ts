import { Request, Response, Router } from 'express';
import type { ServerEnv } from '../env';
import { log } from '../log';
import { MEDIA_STREAM_PATH } from '../media/streamServer';
import { DeserializationError } from '../twilio/errors';
import { StreamNounBuilder, TWIML_CONTENT_TYPE, VoiceResponse } from '../twiml/voiceResponse';
import {
  isConferenceEnd,
  isNoAnswer,
  parseAmdRequestParams,
  parseConferenceRequestParams,
  parseVoiceRequestParams,
} from '../webhooks/requestParams';

type WebhookEnv = Pick<ServerEnv, 'PUBLIC_BASE_URL' | 'MEDIA_STREAM_TOKEN' | 'MEDIA_STREAM_ENABLED'>;

/**
 * Media streams only accept secure websockets, whatever scheme the public URL
 * carries. Only the host is kept: the stream server listens at the root path.
 */
export function buildMediaStreamUrl(publicBaseUrl: string, token: string): string {
  const withoutScheme = publicBaseUrl.trim().replace(/^(https?|wss?):\/\//, '');
  const host = withoutScheme.split(/[/?#]/)[0];
  return `wss://${host}${MEDIA_STREAM_PATH}?token=${encodeURIComponent(token)}`;
}

function parseOrReject<T>(
  req: Request,
  res: Response,
  parse: (input: unknown) => T,
  route: string,
): T | undefined {
  try {
    return parse(req.body);
  } catch (error) {
    if (!(error instanceof DeserializationError)) {
      throw error;
    }
    log.warn(
      { event: 'webhook_invalid', route, issues: error.issues, requestId: res.locals.requestId },
      'webhook parameters invalid',
    );
    res.status(400).json({ error: 'invalid_request', issues: error.issues });
    return undefined;
  }
}

export function createVoiceWebhookRouter(env: WebhookEnv): Router {
  const router = Router();

  router.post('/incoming', (req, res) => {
    const params = parseOrReject(req, res, parseVoiceRequestParams, 'incoming');
    if (!params) {
      return;
    }

    const response = new VoiceResponse();
    if (!env.MEDIA_STREAM_ENABLED) {
      response.reject();
    } else {
      const stream = new StreamNounBuilder()
        .withUrl(buildMediaStreamUrl(env.PUBLIC_BASE_URL, env.MEDIA_STREAM_TOKEN))
        .withParameter('callSid', params.CallSid)
        .build();
      response.connect(stream);
    }

    log.info(
      {
        event: 'incoming_call',
        call_sid: params.CallSid,
        direction: params.Direction,
        action: env.MEDIA_STREAM_ENABLED ? 'connect_stream' : 'reject',
        requestId: res.locals.requestId,
      },
      'incoming call',
    );

    res.status(200).type(TWIML_CONTENT_TYPE).send(response.toXml());
  });

  router.post('/status', (req, res) => {
    const params = parseOrReject(req, res, parseVoiceRequestParams, 'status');
    if (!params) {
      return;
    }

    log.info(
      {
        event: 'call_status',
        call_sid: params.CallSid,
        call_status: params.CallStatus,
        no_answer: isNoAnswer(params),
        requestId: res.locals.requestId,
      },
      'call status callback',
    );
    res.status(204).end();
  });

  router.post('/amd', (req, res) => {
    const params = parseOrReject(req, res, parseAmdRequestParams, 'amd');
    if (!params) {
      return;
    }

    log.info(
      { event: 'amd_result', call_sid: params.CallSid, answered_by: params.AnsweredBy, requestId: res.locals.requestId },
      'answering machine detection result',
    );
    res.status(204).end();
  });

  router.post('/conference', (req, res) => {
    const params = parseOrReject(req, res, parseConferenceRequestParams, 'conference');
    if (!params) {
      return;
    }

    log.info(
      {
        event: 'conference_status',
        conference_sid: params.ConferenceSid,
        status_callback_event: params.StatusCallbackEvent,
        sequence_number: params.SequenceNumber,
        conference_ended: isConferenceEnd(params),
        requestId: res.locals.requestId,
      },
      'conference status callback',
    );
    res.status(204).end();
  });

  return router;
}
