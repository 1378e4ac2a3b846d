import type { Category, CategorizedItem, NormalizedItem, TradeKeywords } from '../interfaces';
import { KEYWORD_CATEGORIES } from './trade-keywords';

export function categorize(description: string, keywords: TradeKeywords): Category {
  const lower = description.toLowerCase();
  return (
    KEYWORD_CATEGORIES.find((category) =>
      keywords[category].some((keyword) => lower.includes(keyword)),
    ) ?? 'Other'
  );
}

export function categorizeItems(
  items: readonly NormalizedItem[],
  keywords: TradeKeywords,
): CategorizedItem[] {
  return items.map((item) =>
    Object.freeze({ ...item, category: categorize(item.description, keywords) }),
  );
}
