import { z } from 'zod';

export const sessionDetailSchema = z
  .object({
    session_id: z.number(),
    session_name: z.string(),
    year_start: z.number(),
    year_end: z.number(),
  })
  .passthrough();

export const sessionInfoSchema = z
  .object({
    session_id: z.number(),
    state_id: z.number(),
    year_start: z.number(),
    year_end: z.number(),
    session_name: z.string(),
    special: z.number().default(0),
    prior: z.number().default(0),
    sine_die: z.number().default(0),
  })
  .passthrough();

export const masterListEntrySchema = z
  .object({
    bill_id: z.number(),
    number: z.string(),
    title: z.string(),
    status: z.number(),
    status_date: z.string().nullish(),
    last_action_date: z.string().nullish(),
    last_action: z.string().nullish(),
    url: z.string().nullish(),
    change_hash: z.string(),
  })
  .passthrough();

export const billHistorySchema = z
  .object({
    date: z.string(),
    action: z.string(),
    chamber: z.string().nullish(),
  })
  .passthrough();

export const billDetailSchema = z
  .object({
    bill_id: z.number(),
    bill_number: z.string(),
    title: z.string(),
    description: z.string().nullish(),
    status: z.number(),
    status_date: z.string().nullish(),
    state: z.string(),
    session: sessionDetailSchema.nullish(),
    url: z.string().nullish(),
    change_hash: z.string().nullish(),
    history: z.array(billHistorySchema).default([]),
    progress: z.array(z.object({ date: z.string(), event: z.number() }).passthrough()).default([]),
  })
  .passthrough();

export const billSearchItemSchema = z
  .object({
    bill_id: z.number(),
    bill_number: z.string(),
    title: z.string(),
    state: z.string(),
    status: z.number().optional(),
    last_action_date: z.string().nullish(),
    last_action: z.string().nullish(),
    url: z.string().nullish(),
    change_hash: z.string().nullish(),
  })
  .passthrough();

export const searchSummarySchema = z
  .object({
    count: z.number(),
    page: z.string().default(''),
    range: z.string().default(''),
    relevancy: z.string().default(''),
    page_current: z.number().nullish(),
    page_total: z.number().nullish(),
  })
  .passthrough();

/** `status: "ERROR"` replies carry the reason in `alert.message`. */
export const errorEnvelopeSchema = z.object({
  status: z.literal('ERROR'),
  alert: z.object({ message: z.string().optional() }).passthrough().optional(),
});

export type SessionDetail = z.infer<typeof sessionDetailSchema>;
export type SessionInfo = z.infer<typeof sessionInfoSchema>;
export type MasterListEntry = z.infer<typeof masterListEntrySchema>;
export type BillHistory = z.infer<typeof billHistorySchema>;
export type BillDetail = z.infer<typeof billDetailSchema>;
export type BillSearchItem = z.infer<typeof billSearchItemSchema>;
export type SearchSummary = z.infer<typeof searchSummarySchema>;

export interface MasterList {
  session: SessionDetail;
  entries: MasterListEntry[];
}

export interface SearchResult {
  summary: SearchSummary;
  results: BillSearchItem[];
}
