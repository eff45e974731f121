import assert from "assert";
import pino from "pino";
import { PriceExtractor, detectCurrency, parsePriceString } from "./price";
import { PricePattern } from "./types";

const DOLLAR_BEFORE: PricePattern = { pattern: "\\$\\s*{price}", minValue: 0, description: "dollar sign before" };
const EURO_AFTER_MIN_1000: PricePattern = { pattern: "{price}\\s*(?:€|eur)", minValue: 1000, description: "euro after" };
const FOR_PRICE: PricePattern = { pattern: "for\\s+{price}", minValue: 0, description: "for <price>" };

function captureLogger(lines: string[]) {
  return pino({ level: "debug" }, { write: (line: string) => void lines.push(line) });
}

function testParsePriceString() {
  const cases: Array<[string, number | null]> = [
    ["1,234.56", 1234.56],
    ["1234,56", 1234.56],
    ["1 234.56", 1234.56],
    ["1.234,56", 1234.56],
    ["1 234", 1234],
    ["1234", 1234],
    ["1,234", 1234],
    ["12.345.678", 12345678],
    ["1.5", 1.5],
    [" 99 ", 99],
    ["1\u00a0234,5", 1234.5],
    ["1\u00a0234,56", 1234.56],
    ["1\u00a0234", 1234],
    ["1\u202f234.50", 1234.5],
    ["12.", 12],
    [".5", 5],
    ["abc", null],
    ["", null],
    ["12a,50", null],
  ];
  for (const [raw, expected] of cases) {
    assert.strictEqual(parsePriceString(raw), expected, `parsePriceString(${JSON.stringify(raw)})`);
  }
}

function testDetectCurrency() {
  assert.strictEqual(detectCurrency("$250"), "$");
  assert.strictEqual(detectCurrency("250€"), "€");
  assert.strictEqual(detectCurrency("150 Eur"), "€");
  assert.strictEqual(detectCurrency("150 евро"), "€");
  assert.strictEqual(detectCurrency("100 USD"), "$");
  assert.strictEqual(detectCurrency("50 Dollars"), "$");
  assert.strictEqual(detectCurrency("50 долларов"), "$");
  assert.strictEqual(detectCurrency("1000 руб"), "");
  // euro group is checked first
  assert.strictEqual(detectCurrency("€20 or $25"), "€");
}

function testDollarExtraction() {
  const extractor = new PriceExtractor([DOLLAR_BEFORE]);
  assert.deepStrictEqual(extractor.extract("Selling a phone for $250, great condition"), { value: 250, currency: "$" });
  assert.deepStrictEqual(extractor.extract("Laptop $1,234.56 obo"), { value: 1234.56, currency: "$" });
  assert.strictEqual(extractor.extract("Laptop, make an offer"), null);
}

function testNoBreakSpaceGrouping() {
  const extractor = new PriceExtractor([DOLLAR_BEFORE]);
  assert.deepStrictEqual(extractor.extract("Bike $1\u00a0234 firm"), { value: 1234, currency: "$" });
  assert.deepStrictEqual(extractor.extract("Bike $1\u00a0234,50"), { value: 1234.5, currency: "$" });
}

function testFirstPatternWins() {
  const text = "iPhone 1200 eur, shipping $20";
  const euroFirst = new PriceExtractor([EURO_AFTER_MIN_1000, DOLLAR_BEFORE]);
  assert.deepStrictEqual(euroFirst.extract(text), { value: 1200, currency: "€" });
  const dollarFirst = new PriceExtractor([DOLLAR_BEFORE, EURO_AFTER_MIN_1000]);
  assert.deepStrictEqual(dollarFirst.extract(text), { value: 20, currency: "$" });
}

function testBelowMinimumTriesNextPattern() {
  const extractor = new PriceExtractor([EURO_AFTER_MIN_1000, FOR_PRICE]);
  assert.deepStrictEqual(extractor.extract("iPhone 15 for 900 eur"), { value: 900, currency: "" });
  assert.deepStrictEqual(extractor.extract("MacBook for 1500 EUR"), { value: 1500, currency: "€" });
}

function testUnparsableCaptureTriesNextPattern() {
  const word: PricePattern = { pattern: "price:\\s*(\\w+)", minValue: 0 };
  const extractor = new PriceExtractor([word, DOLLAR_BEFORE]);
  assert.deepStrictEqual(extractor.extract("price: free, shipping $30"), { value: 30, currency: "$" });
}

function testPatternWithoutCaptureIsSkipped() {
  const noGroup: PricePattern = { pattern: "\\$\\d+", minValue: 0 };
  const extractor = new PriceExtractor([noGroup, FOR_PRICE]);
  assert.deepStrictEqual(extractor.extract("for 40 or $35"), { value: 40, currency: "" });
}

function testInvalidPatternIsReportedAndSkipped() {
  const lines: string[] = [];
  const broken: PricePattern = { pattern: "({price}", minValue: 0, description: "broken" };
  const extractor = new PriceExtractor([broken, DOLLAR_BEFORE], {}, { logger: captureLogger(lines) });
  const warnings = lines.map((l) => JSON.parse(l)).filter((e) => e.level === 40);
  assert.strictEqual(warnings.length, 1);
  assert.strictEqual(warnings[0].pattern, "broken");
  assert.deepStrictEqual(extractor.extract("only $75"), { value: 75, currency: "$" });
}

function testNoPatternsConfigured() {
  const lines: string[] = [];
  const extractor = new PriceExtractor([], {}, { logger: captureLogger(lines) });
  assert.strictEqual(extractor.extract("phone for $250"), null);
  assert.strictEqual(extractor.extract("phone for $300"), null);
  const warnings = lines.map((l) => JSON.parse(l)).filter((e) => e.level === 40);
  assert.strictEqual(warnings.length, 1);
  assert.strictEqual(warnings[0].msg, "No price patterns configured, prices will never be found");
}

function testCustomNumberFormat() {
  // whole numbers only
  const extractor = new PriceExtractor([DOLLAR_BEFORE], { regex: "(\\d+)" });
  assert.deepStrictEqual(extractor.extract("now $1,200"), { value: 1, currency: "$" });
}

function run() {
  testParsePriceString();
  testDetectCurrency();
  testDollarExtraction();
  testNoBreakSpaceGrouping();
  testFirstPatternWins();
  testBelowMinimumTriesNextPattern();
  testUnparsableCaptureTriesNextPattern();
  testPatternWithoutCaptureIsSkipped();
  testInvalidPatternIsReportedAndSkipped();
  testNoPatternsConfigured();
  testCustomNumberFormat();
  // eslint-disable-next-line no-console
  console.log("price extractor tests passed");
}

run();
