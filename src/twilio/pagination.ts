import { z } from 'zod';
import { FormFieldNames } from './form';

/** Page metadata returned alongside every list payload. */
export const PageMetaSchema = z.object({
  page: z.number().int(),
  page_size: z.number().int(),
  start: z.number().int().nullish(),
  end: z.number().int().nullish(),
  uri: z.string(),
  first_page_uri: z.string().nullish(),
  next_page_uri: z.string().nullish(),
  previous_page_uri: z.string().nullish(),
});

export type PageMeta = z.infer<typeof PageMetaSchema>;

export interface PageQuery {
  page?: number;
  pageSize?: number;
  pageToken?: string;
}

export const PAGE_QUERY_NAMES: FormFieldNames<PageQuery> = {
  page: 'Page',
  pageSize: 'PageSize',
  pageToken: 'PageToken',
};
