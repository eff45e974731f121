import { Logger, silentLogger } from "./log";
import { compilePattern, compileUserPattern, escapeRegex, wrapWholeWord } from "./pattern";
import { normalizeForMatching, normalizeLookalikes } from "./text";
import { MatchingSettings } from "./types";

export interface CompiledKeyword {
  keyword: string;
  mode: "pattern" | "literal";
  test(normalizedText: string): boolean;
}

export class KeywordMatcher {
  private readonly logger: Logger;

  constructor(
    private readonly settings: MatchingSettings,
    opts: { logger?: Logger } = {}
  ) {
    this.logger = opts.logger ?? silentLogger();
  }

  normalize(text: string): string {
    return normalizeForMatching(text, this.settings.caseSensitive);
  }

  /**
   * Prepares a keyword for repeated tests against text that went through
   * {@link KeywordMatcher.normalize}. A keyword that is not a valid pattern
   * degrades to literal matching and is reported, never thrown.
   *
   * Patterns are case-folded with the `i` flag rather than by lower-casing
   * their source, so escapes such as `\D` or `\S` keep their meaning.
   */
  compile(keyword: string): CompiledKeyword {
    const { caseSensitive, wholeWord, regexEnabled } = this.settings;
    const folded = this.normalize(keyword);

    if (regexEnabled) {
      const compiled = compileUserPattern(normalizeLookalikes(keyword), { caseSensitive, wholeWord });
      if (compiled.ok) {
        const { regex } = compiled;
        return { keyword, mode: "pattern", test: (text) => regex.test(text) };
      }
      this.logger.warn({ keyword, error: compiled.error }, "Invalid keyword pattern, falling back to literal match");
    }

    if (wholeWord) {
      const literal = compilePattern(wrapWholeWord(escapeRegex(folded)), "u");
      if (literal.ok) {
        const { regex } = literal;
        return { keyword, mode: "literal", test: (text) => regex.test(text) };
      }
    }
    return { keyword, mode: "literal", test: (text) => text.includes(folded) };
  }

  matches(normalizedText: string, keyword: string): boolean {
    return this.compile(keyword).test(normalizedText);
  }
}
