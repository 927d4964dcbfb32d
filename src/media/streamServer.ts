import http from 'http';
import WebSocket, { RawData, WebSocketServer } from 'ws';
import { log } from '../log';
import { incMediaStreamMessage, trackMediaStreamConnection } from '../metrics';
import { InvalidArgumentError, TwilioClientError } from '../twilio/errors';
import {
  clearMessage,
  DtmfMessage,
  markMessage,
  MarkMessage,
  MediaMessage,
  mediaMessage,
  OutboundStreamMessage,
  parseStreamMessage,
  StartMessage,
  StopMessage,
  StreamMessage,
} from './streamMessages';

export const MEDIA_STREAM_PATH = '/media/stream';

type HandlerResult = void | Promise<void>;

export interface MediaStreamHandlers {
  onStart?: (session: MediaStreamSession, message: StartMessage) => HandlerResult;
  onMedia?: (session: MediaStreamSession, message: MediaMessage) => HandlerResult;
  onMark?: (session: MediaStreamSession, message: MarkMessage) => HandlerResult;
  onDtmf?: (session: MediaStreamSession, message: DtmfMessage) => HandlerResult;
  onStop?: (session: MediaStreamSession, message: StopMessage) => HandlerResult;
}

export interface MediaStreamServerOptions {
  token: string;
  handlers?: MediaStreamHandlers;
}

/**
 * One media stream websocket. `streamSid` and `callSid` are known once the
 * `start` message has arrived; sending before that throws.
 */
export class MediaStreamSession {
  public streamSid?: string;
  public callSid?: string;
  public customParameters: Record<string, string> = {};

  constructor(private readonly ws: WebSocket) {}

  public get started(): boolean {
    return this.streamSid !== undefined;
  }

  public sendMedia(payload: string | Buffer): void {
    this.send(mediaMessage(this.requireStreamSid(), payload));
  }

  public sendMark(name: string): void {
    this.send(markMessage(this.requireStreamSid(), name));
  }

  /** Drops audio queued on the remote side that has not played yet. */
  public clear(): void {
    this.send(clearMessage(this.requireStreamSid()));
  }

  public close(code = 1000, reason = 'normal'): void {
    this.ws.close(code, reason);
  }

  public applyStart(message: StartMessage): void {
    this.streamSid = message.start.streamSid;
    this.callSid = message.start.callSid;
    this.customParameters = message.start.customParameters;
  }

  private requireStreamSid(): string {
    if (this.streamSid === undefined) {
      throw new InvalidArgumentError('media stream has not started');
    }
    return this.streamSid;
  }

  private send(message: OutboundStreamMessage): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      log.warn(
        { event: 'media_stream_send_skipped', stream_sid: this.streamSid, outbound_event: message.event },
        'media stream socket not open',
      );
      return;
    }
    this.ws.send(JSON.stringify(message));
  }
}

function parseStreamRequest(request: http.IncomingMessage): { token: string | null } | null {
  if (!request.url) {
    return null;
  }

  const host = request.headers.host ?? 'localhost';
  const url = new URL(request.url, `http://${host}`);
  if (url.pathname !== MEDIA_STREAM_PATH) {
    return null;
  }

  return { token: url.searchParams.get('token') };
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

async function dispatch(
  session: MediaStreamSession,
  message: StreamMessage,
  handlers: MediaStreamHandlers,
): Promise<void> {
  switch (message.event) {
    case 'connected':
      return;
    case 'start':
      session.applyStart(message);
      log.info(
        {
          event: 'media_stream_started',
          stream_sid: session.streamSid,
          call_sid: session.callSid,
          tracks: message.start.tracks,
          encoding: message.start.mediaFormat.encoding,
        },
        'media stream started',
      );
      await handlers.onStart?.(session, message);
      return;
    case 'media':
      await handlers.onMedia?.(session, message);
      return;
    case 'mark':
      await handlers.onMark?.(session, message);
      return;
    case 'dtmf':
      await handlers.onDtmf?.(session, message);
      return;
    case 'stop':
      log.info({ event: 'media_stream_stopped', stream_sid: session.streamSid, call_sid: session.callSid }, 'media stream stopped');
      await handlers.onStop?.(session, message);
      return;
  }
}

export function attachMediaStreamServer(server: http.Server, options: MediaStreamServerOptions): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });
  const handlers = options.handlers ?? {};

  server.on('upgrade', (request, socket, head) => {
    const parsed = parseStreamRequest(request);
    if (!parsed) {
      socket.destroy();
      return;
    }

    if (!parsed.token || parsed.token !== options.token) {
      log.warn({ event: 'media_stream_rejected', reason: 'invalid_token' }, 'media stream upgrade rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  wss.on('connection', (ws: WebSocket) => {
    const session = new MediaStreamSession(ws);
    trackMediaStreamConnection(1);

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        incMediaStreamMessage('binary_ignored');
        return;
      }

      let message: StreamMessage;
      try {
        message = parseStreamMessage(rawDataToString(data));
      } catch (error) {
        incMediaStreamMessage('invalid');
        log.warn({ event: 'media_stream_message_invalid', err: error, stream_sid: session.streamSid }, 'invalid media stream message');
        return;
      }

      incMediaStreamMessage(message.event);
      dispatch(session, message, handlers).catch((error: unknown) => {
        log.error(
          {
            event: 'media_stream_handler_error',
            err: error,
            kind: error instanceof TwilioClientError ? error.kind : undefined,
            stream_sid: session.streamSid,
            stream_event: message.event,
          },
          'media stream handler failed',
        );
      });
    });

    ws.on('close', () => {
      trackMediaStreamConnection(-1);
    });

    ws.on('error', (error) => {
      log.error({ err: error, stream_sid: session.streamSid }, 'media websocket error');
    });
  });

  return wss;
}
