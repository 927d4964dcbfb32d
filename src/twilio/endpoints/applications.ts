import { z } from 'zod';
import { RequestBody, TwilioEndpoint } from '../endpoint';
import { encodeForm, FormFieldNames, FormParams } from '../form';
import { PAGE_QUERY_NAMES, PageMetaSchema, PageQuery } from '../pagination';
import { ApiVersion, ApiVersionSchema, CallbackMethod } from '../types';

const APPLICATIONS_PATH = '/Accounts/{AccountSid}/Applications.json';
const APPLICATION_PATH = '/Accounts/{AccountSid}/Applications/{Sid}.json';

export const ApplicationResourceSchema = z.object({
  sid: z.string(),
  account_sid: z.string(),
  api_version: ApiVersionSchema,
  friendly_name: z.string().nullish(),
  date_created: z.string(),
  date_updated: z.string(),
  message_status_callback: z.string().nullish(),
  sms_fallback_method: z.string().nullish(),
  sms_fallback_url: z.string().nullish(),
  sms_method: z.string().nullish(),
  sms_status_callback: z.string().nullish(),
  sms_url: z.string().nullish(),
  status_callback: z.string().nullish(),
  status_callback_method: z.string().nullish(),
  uri: z.string(),
  voice_caller_id_lookup: z.boolean().nullish(),
  voice_fallback_method: z.string().nullish(),
  voice_fallback_url: z.string().nullish(),
  voice_method: z.string().nullish(),
  voice_url: z.string().nullish(),
  public_application_connect_enabled: z.boolean().nullish(),
});

export type ApplicationResource = z.infer<typeof ApplicationResourceSchema>;

export const ApplicationPageSchema = PageMetaSchema.extend({
  applications: z.array(ApplicationResourceSchema),
});

export type ApplicationPage = z.infer<typeof ApplicationPageSchema>;

/** Create and update take the same fields; all of them are optional. */
export interface ApplicationBody {
  friendlyName?: string;
  apiVersion?: ApiVersion;
  voiceUrl?: string;
  voiceMethod?: CallbackMethod;
  voiceFallbackUrl?: string;
  voiceFallbackMethod?: CallbackMethod;
  voiceCallerIdLookup?: boolean;
  statusCallback?: string;
  statusCallbackMethod?: CallbackMethod;
  smsUrl?: string;
  smsMethod?: CallbackMethod;
  smsFallbackUrl?: string;
  smsFallbackMethod?: CallbackMethod;
  messageStatusCallback?: string;
  publicApplicationConnectEnabled?: boolean;
}

const APPLICATION_FIELD_NAMES: FormFieldNames<ApplicationBody> = {
  friendlyName: 'FriendlyName',
  apiVersion: 'ApiVersion',
  voiceUrl: 'VoiceUrl',
  voiceMethod: 'VoiceMethod',
  voiceFallbackUrl: 'VoiceFallbackUrl',
  voiceFallbackMethod: 'VoiceFallbackMethod',
  voiceCallerIdLookup: 'VoiceCallerIdLookup',
  statusCallback: 'StatusCallback',
  statusCallbackMethod: 'StatusCallbackMethod',
  smsUrl: 'SmsUrl',
  smsMethod: 'SmsMethod',
  smsFallbackUrl: 'SmsFallbackUrl',
  smsFallbackMethod: 'SmsFallbackMethod',
  messageStatusCallback: 'MessageStatusCallback',
  publicApplicationConnectEnabled: 'PublicApplicationConnectEnabled',
};

export class CreateApplication extends TwilioEndpoint<ApplicationBody, ApplicationResource> {
  constructor(accountSid: string, body: ApplicationBody = {}) {
    super(
      'create_application',
      'POST',
      APPLICATIONS_PATH,
      { AccountSid: accountSid },
      body,
      ApplicationResourceSchema,
    );
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeForm(this.body, APPLICATION_FIELD_NAMES) };
  }
}

export class FetchApplication extends TwilioEndpoint<undefined, ApplicationResource> {
  constructor(accountSid: string, applicationSid: string) {
    super(
      'fetch_application',
      'GET',
      APPLICATION_PATH,
      { AccountSid: accountSid, Sid: applicationSid },
      undefined,
      ApplicationResourceSchema,
    );
  }
}

export interface ListApplicationsQuery extends PageQuery {
  friendlyName?: string;
}

const LIST_APPLICATIONS_QUERY_NAMES: FormFieldNames<ListApplicationsQuery> = {
  ...PAGE_QUERY_NAMES,
  friendlyName: 'FriendlyName',
};

export class ListApplications extends TwilioEndpoint<undefined, ApplicationPage> {
  private readonly query: ListApplicationsQuery;

  constructor(accountSid: string, query: ListApplicationsQuery = {}) {
    super(
      'list_applications',
      'GET',
      APPLICATIONS_PATH,
      { AccountSid: accountSid },
      undefined,
      ApplicationPageSchema,
    );
    this.query = query;
  }

  public override queryParams(): FormParams {
    return encodeForm(this.query, LIST_APPLICATIONS_QUERY_NAMES);
  }
}

export class UpdateApplication extends TwilioEndpoint<ApplicationBody, ApplicationResource> {
  constructor(accountSid: string, applicationSid: string, body: ApplicationBody) {
    super(
      'update_application',
      'POST',
      APPLICATION_PATH,
      { AccountSid: accountSid, Sid: applicationSid },
      body,
      ApplicationResourceSchema,
    );
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeForm(this.body, APPLICATION_FIELD_NAMES) };
  }
}

export class DeleteApplication extends TwilioEndpoint<undefined, void> {
  constructor(accountSid: string, applicationSid: string) {
    super(
      'delete_application',
      'DELETE',
      APPLICATION_PATH,
      { AccountSid: accountSid, Sid: applicationSid },
      undefined,
      z.void(),
    );
  }
}
