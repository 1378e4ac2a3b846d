import { readFileSync } from 'fs';
import * as joi from 'joi';

import defaultKeywords from '../../../config/trade-keywords.json';
import type { KeywordCategory, TradeKeywords } from '../interfaces';

export const KEYWORD_CATEGORIES: readonly KeywordCategory[] = [
  'Roofing',
  'Electrical',
  'Plumbing',
  'Drywall/Painting',
  'Foundation/Concrete',
];

const keywordList = joi.array().items(joi.string().trim().lowercase().min(1)).default([]);

const keywordsSchema = joi
  .object<TradeKeywords>({
    Roofing: keywordList,
    Electrical: keywordList,
    Plumbing: keywordList,
    'Drywall/Painting': keywordList,
    'Foundation/Concrete': keywordList,
  })
  .required();

export function parseTradeKeywords(input: unknown): TradeKeywords {
  const { error, value } = keywordsSchema.validate(input);
  if (error) {
    throw new Error(`Trade keywords validation error: ${error.message}`);
  }
  return value;
}

export function loadTradeKeywords(file?: string | null): TradeKeywords {
  if (!file) return parseTradeKeywords(defaultKeywords);
  return parseTradeKeywords(JSON.parse(readFileSync(file, 'utf8')));
}
