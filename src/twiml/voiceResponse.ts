import { TwimlError } from '../twilio/errors';

export const TWIML_CONTENT_TYPE = 'application/xml';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export type StreamTrack = 'inbound_track' | 'outbound_track' | 'both_tracks';

export interface StreamParameter {
  name: string;
  value: string;
}

/** `<Stream>` noun: forks call audio to a websocket. */
export interface StreamNoun {
  url: string;
  name?: string;
  track?: StreamTrack;
  statusCallback?: string;
  statusCallbackMethod?: string;
  parameters?: StreamParameter[];
}

export type Verb = { verb: 'connect'; noun: StreamNoun } | { verb: 'reject' };

function escXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function isParsableUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function assertWebSocketUrl(url: string): void {
  if (!isParsableUrl(url)) {
    throw new TwimlError('invalid_websocket_url', `invalid websocket url: ${url}`);
  }
  if (!url.startsWith('wss://')) {
    throw new TwimlError('invalid_websocket_url', "invalid websocket url: URL must start with 'wss://'");
  }
}

function assertCallbackUrl(url: string): void {
  if (!isParsableUrl(url)) {
    throw new TwimlError('invalid_callback_url', `invalid callback url: ${url}`);
  }
}

type Attributes = Array<[string, string | undefined]>;

function element(name: string, attributes: Attributes, children: string[] = []): string {
  const attrs = attributes
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([key, value]) => ` ${key}="${escXml(value)}"`)
    .join('');

  if (children.length === 0) {
    return `<${name}${attrs} />`;
  }
  return `<${name}${attrs}>${children.join('')}</${name}>`;
}

function renderStream(stream: StreamNoun): string {
  assertWebSocketUrl(stream.url);
  if (stream.statusCallback !== undefined) {
    assertCallbackUrl(stream.statusCallback);
  }

  const parameters = (stream.parameters ?? []).map((parameter) =>
    element('Parameter', [
      ['name', parameter.name],
      ['value', parameter.value],
    ]),
  );

  return element(
    'Stream',
    [
      ['url', stream.url],
      ['name', stream.name],
      ['track', stream.track],
      ['statusCallback', stream.statusCallback],
      ['statusCallbackMethod', stream.statusCallbackMethod],
    ],
    parameters,
  );
}

function renderVerb(verb: Verb): string {
  switch (verb.verb) {
    case 'connect':
      return element('Connect', [], [renderStream(verb.noun)]);
    case 'reject':
      return element('Reject', []);
  }
}

/**
 * Voice TwiML document. Verbs render in the order they were added; stream
 * URLs are validated at render time, so a document built from plain strings
 * fails in `toXml()` rather than on the remote side.
 */
export class VoiceResponse {
  private readonly verbs: Verb[] = [];

  public connect(noun: StreamNoun | string): this {
    this.verbs.push({ verb: 'connect', noun: typeof noun === 'string' ? { url: noun } : noun });
    return this;
  }

  public reject(): this {
    this.verbs.push({ verb: 'reject' });
    return this;
  }

  public getVerbs(): readonly Verb[] {
    return this.verbs;
  }

  public toXml(): string {
    return `${XML_DECLARATION}${element('Response', [], this.verbs.map(renderVerb))}`;
  }
}

export class StreamNounBuilder {
  private url?: string;
  private name?: string;
  private track?: StreamTrack;
  private statusCallback?: string;
  private statusCallbackMethod?: string;
  private parameters?: StreamParameter[];

  public withUrl(url: string): this {
    assertWebSocketUrl(url);
    this.url = url;
    return this;
  }

  public withName(name: string): this {
    this.name = name;
    return this;
  }

  public withTrack(track: StreamTrack): this {
    this.track = track;
    return this;
  }

  public withStatusCallback(callback: string): this {
    assertCallbackUrl(callback);
    this.statusCallback = callback;
    return this;
  }

  public withStatusCallbackMethod(method: string): this {
    this.statusCallbackMethod = method;
    return this;
  }

  public withParameter(name: string, value: string): this {
    this.parameters = [...(this.parameters ?? []), { name, value }];
    return this;
  }

  public build(): StreamNoun {
    if (this.url === undefined) {
      throw new TwimlError('invalid_websocket_url', 'invalid websocket url: WebSocket URL is required');
    }

    return {
      url: this.url,
      name: this.name,
      track: this.track,
      statusCallback: this.statusCallback,
      statusCallbackMethod: this.statusCallbackMethod,
      parameters: this.parameters,
    };
  }
}
