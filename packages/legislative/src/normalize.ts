import type { BillDetail } from './types.js';

const STATUS_LABELS: Record<number, string> = {
  1: 'introduced',
  2: 'engrossed',
  3: 'enrolled',
  4: 'passed',
  5: 'vetoed',
  6: 'failed',
};

export function billStatusLabel(status: number): string {
  return STATUS_LABELS[status] ?? `unknown(${status})`;
}

/** Calendar dates only; anything else (including "0000-00-00") is null. */
export function parseBillDate(value: string | null | undefined): string | null {
  if (!value || !/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const parsed = new Date(`${value}T00:00:00Z`);
  return Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value ? null : value;
}

export interface NormalizedBillEvent {
  date: string | null;
  chamber: string | null;
  description: string;
}

export interface NormalizedBill {
  billId: number;
  jurisdiction: string;
  session: string | null;
  billNumber: string;
  title: string;
  summary: string | null;
  status: string;
  statusDate: string | null;
  introducedDate: string | null;
  lastActionDate: string | null;
  sourceUrl: string | null;
  events: NormalizedBillEvent[];
}

/** Flattens a bill detail into the shape persisted alongside the raw payload. */
export function normalizeBill(detail: BillDetail): NormalizedBill {
  const history = detail.history;
  return {
    billId: detail.bill_id,
    jurisdiction: detail.state,
    session: detail.session?.session_name ?? null,
    billNumber: detail.bill_number,
    title: detail.title,
    summary: detail.description ?? null,
    status: billStatusLabel(detail.status),
    statusDate: parseBillDate(detail.status_date),
    introducedDate: parseBillDate(history[0]?.date),
    lastActionDate: parseBillDate(history[history.length - 1]?.date),
    sourceUrl: detail.url ?? null,
    events: history.map((event) => ({
      date: parseBillDate(event.date),
      chamber: event.chamber ?? null,
      description: event.action,
    })),
  };
}
