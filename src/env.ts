import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './twilio/errors';
import { emptyToUndefined, stringToBoolean } from './util/preprocess';

dotenv.config();

export const DEFAULT_BASE_URL = 'https://api.twilio.com';

const TwilioEnvSchema = z
  .object({
    TWILIO_ACCOUNT_SID: z.preprocess(emptyToUndefined, z.string({ required_error: 'not set' }).min(1)),
    TWILIO_AUTH_TOKEN: z.preprocess(emptyToUndefined, z.string({ required_error: 'not set' }).min(1)),
    TWILIO_API_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    TWILIO_API_KEY_SECRET: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    TWILIO_PHONE_NUMBER: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    TWILIO_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_BASE_URL)),
  })
  .superRefine((value, ctx) => {
    if ((value.TWILIO_API_KEY === undefined) !== (value.TWILIO_API_KEY_SECRET === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'TWILIO_API_KEY and TWILIO_API_KEY_SECRET must be set together',
        path: ['TWILIO_API_KEY'],
      });
    }
  });

export type TwilioEnv = z.infer<typeof TwilioEnvSchema>;

const ServerEnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(3000)),
  PUBLIC_BASE_URL: z.string().min(1),
  MEDIA_STREAM_TOKEN: z.string().min(1),
  MEDIA_STREAM_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(true)),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

function parseEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, source: NodeJS.ProcessEnv, label: string): T {
  const parsed = schema.safeParse(source);

  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid ${label} environment variables: ${issues.join(', ')}`, issues);
  }

  return parsed.data;
}

export function loadTwilioEnv(source: NodeJS.ProcessEnv = process.env): TwilioEnv {
  return parseEnv(TwilioEnvSchema, source, 'Twilio');
}

export function loadServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  return parseEnv(ServerEnvSchema, source, 'server');
}
