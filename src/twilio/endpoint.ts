import { z } from 'zod';
import { InvalidArgumentError } from './errors';
import { FormParams } from './form';

export const API_VERSION = '2010-04-01';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type RequestBody = { kind: 'empty' } | { kind: 'form'; params: FormParams };

export type ResponseSchema<TResponse> = z.ZodType<TResponse, z.ZodTypeDef, unknown>;

export type PathParams = Record<string, string>;

const PLACEHOLDER_REGEX = /\{([A-Za-z]+)\}/g;

/**
 * Substitutes `{Name}` placeholders. Every placeholder must have a non-empty
 * value; values are URI-encoded so a SID can never add path segments.
 */
export function resolvePath(template: string, params: PathParams): string {
  return template.replace(PLACEHOLDER_REGEX, (_match, name: string) => {
    const value = params[name];
    if (value === undefined || value.trim() === '') {
      throw new InvalidArgumentError(`path parameter ${name} must be a non-empty string`);
    }
    return encodeURIComponent(value);
  });
}

/**
 * One API action: where it lives, how it is called, what it sends and how its
 * success payload decodes. The client dispatches any subclass without knowing
 * which action it is.
 */
export abstract class TwilioEndpoint<TBody, TResponse> {
  public readonly path: string;

  protected constructor(
    public readonly name: string,
    public readonly method: HttpMethod,
    template: string,
    pathParams: PathParams,
    public readonly body: TBody,
    public readonly responseSchema: ResponseSchema<TResponse>,
  ) {
    this.path = resolvePath(`/${API_VERSION}${template}`, pathParams);
  }

  public queryParams(): FormParams {
    return [];
  }

  public requestBody(): RequestBody {
    return { kind: 'empty' };
  }
}
