import { Logger, silentLogger } from "./log";
import { compilePattern } from "./pattern";
import { Currency, ExtractedPrice, PriceNumberFormat, PricePattern } from "./types";

export const PRICE_PLACEHOLDER = "{price}";
export const DEFAULT_PRICE_NUMBER_REGEX = "(\\d{1,4}(?:[,\\s]\\d{3})*(?:[.,]\\d{1,2})?)";

// Checked in order; the first group with a token present wins.
const CURRENCY_TOKENS: ReadonlyArray<{ currency: Currency; symbols: string[]; words: string[] }> = [
  { currency: "€", symbols: ["€"], words: ["eur", "евро"] },
  { currency: "$", symbols: ["$"], words: ["usd", "dollar", "доллар"] },
];

const SEPARATORS_RE = /[.,\s]/g;
const DIGITS_RE = /^\d+$/;
const FRACTION_RE = /^\d{1,2}$/;

/**
 * Parses a captured price string whose grouping and decimal separators may be
 * either `.` or `,`. The later of the two is the decimal separator when one or
 * two digits follow it; every other separator is a thousands separator.
 *
 * Returns null when what is left is not a plain digit run.
 */
export function parsePriceString(raw: string): number | null {
  const cleaned = raw.trim();
  const lastDot = cleaned.lastIndexOf(".");
  const lastComma = cleaned.lastIndexOf(",");
  const decimalPos = Math.max(lastDot, lastComma);

  if (decimalPos > 0 && FRACTION_RE.test(cleaned.slice(decimalPos + 1))) {
    const intPart = cleaned.slice(0, decimalPos).replace(SEPARATORS_RE, "");
    const fraction = cleaned.slice(decimalPos + 1);
    if (!DIGITS_RE.test(intPart)) return null;
    return parseFloat(`${intPart}.${fraction}`);
  }

  const digits = cleaned.replace(SEPARATORS_RE, "");
  if (!DIGITS_RE.test(digits)) return null;
  return parseInt(digits, 10);
}

export function detectCurrency(matchedText: string): Currency {
  const lower = matchedText.toLowerCase();
  for (const group of CURRENCY_TOKENS) {
    if (group.symbols.some((s) => matchedText.includes(s)) || group.words.some((w) => lower.includes(w))) {
      return group.currency;
    }
  }
  return "";
}

interface CompiledPricePattern {
  regex: RegExp;
  minValue: number;
  label: string;
}

export class PriceExtractor {
  private readonly logger: Logger;
  private readonly patterns: CompiledPricePattern[];

  constructor(
    patterns: PricePattern[],
    numberFormat: Partial<PriceNumberFormat> = {},
    opts: { logger?: Logger } = {}
  ) {
    this.logger = opts.logger ?? silentLogger();
    const numberRegex = numberFormat.regex || DEFAULT_PRICE_NUMBER_REGEX;

    if (patterns.length === 0) {
      this.logger.warn("No price patterns configured, prices will never be found");
    }

    this.patterns = [];
    for (const p of patterns) {
      if (!p.pattern) continue;
      const source = p.pattern.split(PRICE_PLACEHOLDER).join(numberRegex);
      const label = p.description || p.pattern;
      const compiled = compilePattern(source, "i");
      if (!compiled.ok) {
        this.logger.warn({ pattern: label, error: compiled.error }, "Invalid price pattern, skipping");
        continue;
      }
      this.patterns.push({ regex: compiled.regex, minValue: p.minValue, label });
    }
  }

  extract(text: string): ExtractedPrice | null {
    for (const p of this.patterns) {
      const match = p.regex.exec(text);
      if (!match) continue;

      const captured = match[1];
      if (captured === undefined) {
        this.logger.debug({ pattern: p.label }, "Price pattern has no numeric capture, trying next pattern");
        continue;
      }

      const value = parsePriceString(captured);
      if (value === null) {
        this.logger.debug({ pattern: p.label, captured }, "Could not parse price, trying next pattern");
        continue;
      }

      if (value < p.minValue) {
        this.logger.debug({ pattern: p.label, value, minValue: p.minValue }, "Price below pattern minimum, trying next pattern");
        continue;
      }

      const currency = detectCurrency(match[0]);
      this.logger.debug({ pattern: p.label, value, currency }, "Price extracted");
      return { value, currency };
    }

    this.logger.debug("No price found in message");
    return null;
  }
}
