/**
 * Zod schemas for external API responses.
 *
 * These validate the shape of JSON payloads at the system boundary before
 * they reach the fetch scheduler, so an upstream contract change surfaces as
 * a `malformed` absent marker instead of NaN prices downstream.
 */

import { z } from 'zod';
import { UpstreamError } from './errors.js';

const nullableNumber = z.number().nullable().optional();

// ---------------------------------------------------------------------------
// Quote  (v7/finance/quote)
// ---------------------------------------------------------------------------

export const QuoteResultSchema = z
  .object({
    symbol: z.string(),
    shortName: z.string().nullable().optional(),
    longName: z.string().nullable().optional(),
    currency: z.string().nullable().optional(),
    regularMarketPrice: nullableNumber,
    regularMarketPreviousClose: nullableNumber,
    regularMarketOpen: nullableNumber,
    regularMarketDayHigh: nullableNumber,
    regularMarketDayLow: nullableNumber,
    regularMarketVolume: nullableNumber,
    averageDailyVolume3Month: nullableNumber,
    averageDailyVolume10Day: nullableNumber,
    marketCap: nullableNumber,
    fiftyTwoWeekHigh: nullableNumber,
    fiftyTwoWeekLow: nullableNumber,
    preMarketPrice: nullableNumber,
    postMarketPrice: nullableNumber,
  })
  .passthrough();

export const QuoteResponseSchema = z.object({
  quoteResponse: z.object({
    result: z.array(QuoteResultSchema).nullable(),
    error: z.unknown().optional(),
  }),
});

export type QuoteResult = z.infer<typeof QuoteResultSchema>;

// ---------------------------------------------------------------------------
// Daily history  (v8/finance/chart)
// ---------------------------------------------------------------------------

const UpstreamErrorBodySchema = z
  .object({
    code: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

export const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z
          .object({
            timestamp: z.array(z.number()).optional(),
            indicators: z.object({
              quote: z.array(
                z
                  .object({
                    close: z.array(z.number().nullable()).optional(),
                  })
                  .passthrough(),
              ),
            }),
          })
          .passthrough(),
      )
      .nullable(),
    error: UpstreamErrorBodySchema.nullable().optional(),
  }),
});

export type ChartResponse = z.infer<typeof ChartResponseSchema>;

// ---------------------------------------------------------------------------
// Calendar events  (v10/finance/quoteSummary?modules=calendarEvents)
// ---------------------------------------------------------------------------

const RawDateSchema = z.object({ raw: z.number() }).passthrough();

export const CalendarResponseSchema = z.object({
  quoteSummary: z.object({
    result: z
      .array(
        z
          .object({
            calendarEvents: z
              .object({
                earnings: z
                  .object({
                    earningsDate: z.array(RawDateSchema).optional(),
                  })
                  .passthrough()
                  .optional(),
                exDividendDate: RawDateSchema.nullable().optional(),
              })
              .passthrough()
              .optional(),
          })
          .passthrough(),
      )
      .nullable(),
    error: UpstreamErrorBodySchema.nullable().optional(),
  }),
});

export type CalendarResponse = z.infer<typeof CalendarResponseSchema>;

// ---------------------------------------------------------------------------
// News  (v1/finance/search)
// ---------------------------------------------------------------------------

export const NewsSearchResponseSchema = z
  .object({
    news: z
      .array(
        z
          .object({
            title: z.string(),
            publisher: z.string().optional(),
            link: z.string(),
            providerPublishTime: z.number().optional(),
            relatedTickers: z.array(z.string()).optional(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

export type NewsSearchResponse = z.infer<typeof NewsSearchResponseSchema>;

// ---------------------------------------------------------------------------
// Notion database query
// ---------------------------------------------------------------------------

const NotionRichTextSchema = z.array(
  z
    .object({
      plain_text: z.string().optional(),
      text: z.object({ content: z.string() }).partial().optional(),
    })
    .passthrough(),
);

const NotionSelectSchema = z.object({ name: z.string() }).passthrough().nullable();

export const NotionPagePropertiesSchema = z
  .object({
    Ticker: z.object({ title: NotionRichTextSchema }).passthrough().optional(),
    'Company Name': z.object({ rich_text: NotionRichTextSchema }).passthrough().optional(),
    Sector: z.object({ select: NotionSelectSchema }).passthrough().optional(),
    Category: z
      .object({ multi_select: z.array(z.object({ name: z.string() }).passthrough()) })
      .passthrough()
      .optional(),
    Status: z.object({ select: NotionSelectSchema }).passthrough().optional(),
    Sentiment: z.object({ select: NotionSelectSchema }).passthrough().optional(),
    'Investment Thesis': z.object({ rich_text: NotionRichTextSchema }).passthrough().optional(),
    Catalysts: z.object({ rich_text: NotionRichTextSchema }).passthrough().optional(),
  })
  .passthrough();

export const NotionQueryResponseSchema = z.object({
  results: z.array(
    z
      .object({
        id: z.string().optional(),
        properties: NotionPagePropertiesSchema,
      })
      .passthrough(),
  ),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullable().optional(),
});

export type NotionPageProperties = z.infer<typeof NotionPagePropertiesSchema>;
export type NotionQueryResponse = z.infer<typeof NotionQueryResponseSchema>;

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON payload against a Zod schema. Failure throws a
 * non-retryable `malformed` UpstreamError naming the first offending paths.
 */
export function parseUpstreamPayload<S extends z.ZodTypeAny>(schema: S, payload: unknown, label: string): z.output<S> {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  const issues = result.error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  throw new UpstreamError('malformed', `${label}: response failed validation (${issues})`, { cause: result.error });
}
