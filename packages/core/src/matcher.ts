import { CompiledKeyword, KeywordMatcher } from "./keywords";
import { Logger, silentLogger } from "./log";
import { PriceExtractor } from "./price";
import { MatchResult, MatchingSettings, PriceNumberFormat, PricePattern, PriceRange, Product } from "./types";

export interface ProductMatcherOptions {
  products: Product[];
  matching: MatchingSettings;
  pricePatterns: PricePattern[];
  priceNumberFormat?: Partial<PriceNumberFormat>;
  logger?: Logger;
}

interface CompiledProduct {
  product: Product;
  keywords: CompiledKeyword[];
  excludeKeywords: CompiledKeyword[];
  priceRange: Required<PriceRange> | null;
}

function resolvePriceRange(range?: PriceRange): Required<PriceRange> | null {
  if (!range || (range.min === undefined && range.max === undefined)) return null;
  return { min: range.min ?? 0, max: range.max ?? Number.POSITIVE_INFINITY };
}

/**
 * Evaluates every configured product against a message. Keyword and price
 * patterns are compiled once here, so a broken pattern is reported once per
 * matcher rather than once per message.
 */
export class ProductMatcher {
  private readonly logger: Logger;
  private readonly keywordMatcher: KeywordMatcher;
  private readonly priceExtractor: PriceExtractor;
  private readonly products: CompiledProduct[];

  constructor(opts: ProductMatcherOptions) {
    this.logger = opts.logger ?? silentLogger();
    this.keywordMatcher = new KeywordMatcher(opts.matching, { logger: this.logger });
    this.priceExtractor = new PriceExtractor(opts.pricePatterns, opts.priceNumberFormat, { logger: this.logger });
    this.products = opts.products.map((product) => ({
      product,
      keywords: product.keywords.map((k) => this.keywordMatcher.compile(k)),
      excludeKeywords: product.excludeKeywords.map((k) => this.keywordMatcher.compile(k)),
      priceRange: resolvePriceRange(product.priceRange),
    }));
    this.logger.debug({ products: this.products.length, pricePatterns: opts.pricePatterns.length }, "Product matcher ready");
  }

  matchMessage(messageText: string): MatchResult[] {
    if (!messageText) return [];

    const text = this.keywordMatcher.normalize(messageText);
    const results: MatchResult[] = [];
    for (const compiled of this.products) {
      const result = this.matchProduct(text, messageText, compiled);
      if (result) results.push(result);
    }
    return results;
  }

  private matchProduct(text: string, rawText: string, compiled: CompiledProduct): MatchResult | null {
    const { product, priceRange } = compiled;

    const matchedKeywords = compiled.keywords.filter((k) => k.test(text)).map((k) => k.keyword);
    if (matchedKeywords.length === 0) return null;

    const excludedBy = compiled.excludeKeywords.find((k) => k.test(text));
    if (excludedBy) {
      this.logger.debug({ product: product.name, keyword: excludedBy.keyword }, "Message excluded by keyword");
      return null;
    }

    let price: number | null = null;
    let currency: MatchResult["currency"] = null;
    if (priceRange) {
      const extracted = this.priceExtractor.extract(rawText);
      if (!extracted) {
        this.logger.debug({ product: product.name }, "Price range configured but no price found");
        return null;
      }
      if (extracted.value < priceRange.min || extracted.value > priceRange.max) {
        this.logger.debug(
          { product: product.name, price: extracted.value, min: priceRange.min, max: priceRange.max },
          "Price outside range"
        );
        return null;
      }
      price = extracted.value;
      currency = extracted.currency;
    }

    return {
      productName: product.name,
      matchedKeywords,
      price,
      currency,
      notify: product.notify,
    };
  }
}
