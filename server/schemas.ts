import { z } from 'zod';

/** Watchlist, index (`^GSPC`), future (`ES=F`) and crypto pair (`BTC-USD`) symbols. */
export const tickerSymbol = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9^.=-]{1,15}$/, 'Invalid ticker symbol');

export const quoteParams = z.object({
  symbol: tickerSymbol,
});
