// src/generation/tools/amount-extractor.tool.ts
import { Injectable } from '@nestjs/common';
import type { Currency, ExtractionTool, MonetaryAmount } from './extraction-tool';

const NUMBER = '(\\d{1,3}(?:,\\d{3})+|\\d+)(?:\\.(\\d{1,2}))?';

// "$1,500.00", "USD 200", "€ 40" or "1,500 USD", "200 euros"
const PREFIXED = new RegExp(`(US\\$|\\$|€|£|\\bUSD|\\bEUR|\\bGBP)\\s?${NUMBER}`, 'i');
const SUFFIXED = new RegExp(`\\b${NUMBER}\\s?(USD|EUR|GBP|dollars?|euros?|pounds?)\\b`, 'i');

const CURRENCIES: Record<string, Currency> = {
  us$: 'USD',
  $: 'USD',
  usd: 'USD',
  dollar: 'USD',
  dollars: 'USD',
  '€': 'EUR',
  eur: 'EUR',
  euro: 'EUR',
  euros: 'EUR',
  '£': 'GBP',
  gbp: 'GBP',
  pound: 'GBP',
  pounds: 'GBP',
};

function toAmount(symbol: string, whole: string, cents: string | undefined): MonetaryAmount | null {
  const currency = CURRENCIES[symbol.toLowerCase()];
  if (!currency) return null;
  const value = Number(`${whole.replace(/,/g, '')}${cents ? `.${cents}` : ''}`);
  return Number.isFinite(value) ? { value, currency } : null;
}

/** First monetary amount in the text, whichever side the currency is written on. */
export function extractAmount(text: string): MonetaryAmount | null {
  const pre = PREFIXED.exec(text);
  const post = SUFFIXED.exec(text);

  if (pre && (!post || pre.index <= post.index)) {
    return toAmount(pre[1], pre[2], pre[3]);
  }
  if (post) {
    return toAmount(post[3], post[1], post[2]);
  }
  return null;
}

@Injectable()
export class AmountExtractorTool implements ExtractionTool<MonetaryAmount> {
  readonly name = 'extract_amount';
  readonly description =
    'Returns the first monetary amount in the text as { value, currency } (USD, EUR or GBP), or null.';

  async run(text: string): Promise<MonetaryAmount | null> {
    return extractAmount(text);
  }
}
