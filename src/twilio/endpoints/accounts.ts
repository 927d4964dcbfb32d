import { z } from 'zod';
import { RequestBody, TwilioEndpoint } from '../endpoint';
import { encodeForm, FormFieldNames, FormParams } from '../form';
import { PAGE_QUERY_NAMES, PageMetaSchema, PageQuery } from '../pagination';

const ACCOUNTS_PATH = '/Accounts.json';
const ACCOUNT_PATH = '/Accounts/{Sid}.json';

export const AccountStatusSchema = z.enum(['active', 'suspended', 'closed']);
export type AccountStatus = z.infer<typeof AccountStatusSchema>;

export const AccountResourceSchema = z.object({
  sid: z.string(),
  owner_account_sid: z.string(),
  friendly_name: z.string(),
  status: AccountStatusSchema,
  type: z.enum(['Trial', 'Full']),
  auth_token: z.string(),
  date_created: z.string(),
  date_updated: z.string(),
  uri: z.string(),
});

export type AccountResource = z.infer<typeof AccountResourceSchema>;

export const AccountPageSchema = PageMetaSchema.extend({
  accounts: z.array(AccountResourceSchema),
});

export type AccountPage = z.infer<typeof AccountPageSchema>;

export interface CreateAccountBody {
  /** Up to 64 characters; the remote default is `SubAccount Created at {date}`. */
  friendlyName?: string;
}

const CREATE_ACCOUNT_FIELD_NAMES: FormFieldNames<CreateAccountBody> = {
  friendlyName: 'FriendlyName',
};

/** Creates a subaccount of the authenticated account. */
export class CreateAccount extends TwilioEndpoint<CreateAccountBody, AccountResource> {
  constructor(body: CreateAccountBody = {}) {
    super('create_account', 'POST', ACCOUNTS_PATH, {}, body, AccountResourceSchema);
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeForm(this.body, CREATE_ACCOUNT_FIELD_NAMES) };
  }
}

export class FetchAccount extends TwilioEndpoint<undefined, AccountResource> {
  constructor(accountSid: string) {
    super('fetch_account', 'GET', ACCOUNT_PATH, { Sid: accountSid }, undefined, AccountResourceSchema);
  }
}

export interface ListAccountsQuery extends PageQuery {
  friendlyName?: string;
  status?: AccountStatus;
}

const LIST_ACCOUNTS_QUERY_NAMES: FormFieldNames<ListAccountsQuery> = {
  ...PAGE_QUERY_NAMES,
  friendlyName: 'FriendlyName',
  status: 'Status',
};

export class ListAccounts extends TwilioEndpoint<undefined, AccountPage> {
  private readonly query: ListAccountsQuery;

  constructor(query: ListAccountsQuery = {}) {
    super('list_accounts', 'GET', ACCOUNTS_PATH, {}, undefined, AccountPageSchema);
    this.query = query;
  }

  public override queryParams(): FormParams {
    return encodeForm(this.query, LIST_ACCOUNTS_QUERY_NAMES);
  }
}

export interface UpdateAccountBody {
  friendlyName?: string;
  status?: AccountStatus;
}

const UPDATE_ACCOUNT_FIELD_NAMES: FormFieldNames<UpdateAccountBody> = {
  friendlyName: 'FriendlyName',
  status: 'Status',
};

export class UpdateAccount extends TwilioEndpoint<UpdateAccountBody, AccountResource> {
  constructor(accountSid: string, body: UpdateAccountBody) {
    super('update_account', 'POST', ACCOUNT_PATH, { Sid: accountSid }, body, AccountResourceSchema);
  }

  public override requestBody(): RequestBody {
    return { kind: 'form', params: encodeForm(this.body, UPDATE_ACCOUNT_FIELD_NAMES) };
  }
}
