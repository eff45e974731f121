export type Currency = "€" | "$" | "";

export interface PriceRange {
  min?: number;
  max?: number;
}

export interface Product {
  name: string;
  keywords: string[];
  excludeKeywords: string[];
  priceRange?: PriceRange;
  notify: boolean;
}

export interface PricePattern {
  pattern: string;
  minValue: number;
  description?: string;
}

export interface PriceNumberFormat {
  regex: string;
}

export interface MatchingSettings {
  caseSensitive: boolean;
  wholeWord: boolean;
  regexEnabled: boolean;
}

export interface ExtractedPrice {
  value: number;
  currency: Currency;
}

export interface MatchResult {
  productName: string;
  matchedKeywords: string[];
  price: number | null;
  currency: Currency | null;
  notify: boolean;
}
