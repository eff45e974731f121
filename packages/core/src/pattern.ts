export type CompiledPattern = { ok: true; regex: RegExp } | { ok: false; error: string };

// Letters, digits and underscore in any script; `\b` only knows ASCII.
const WORD_CHAR = "[\\p{L}\\p{N}_]";
// Same idea for patterns that only compile without the `u` flag: Latin,
// Greek and Cyrillic letters spelled out as code point ranges.
const LEGACY_WORD_CHAR = "[0-9A-Za-z_\\u00C0-\\u024F\\u0370-\\u03FF\\u0400-\\u04FF]";

export function compilePattern(source: string, flags = ""): CompiledPattern {
  try {
    return { ok: true, regex: new RegExp(source, flags) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function escapeRegex(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function wrapWholeWord(source: string, unicode = true): string {
  const word = unicode ? WORD_CHAR : LEGACY_WORD_CHAR;
  return `(?<!${word})(?:${source})(?!${word})`;
}

/**
 * Compiles a user-written pattern, in Unicode mode when it allows, otherwise
 * without the `u` flag so identity escapes like `\-` or `\ ` stay valid.
 */
export function compileUserPattern(
  source: string,
  opts: { caseSensitive: boolean; wholeWord: boolean }
): CompiledPattern {
  const fold = opts.caseSensitive ? "" : "i";
  const unicode = compilePattern(opts.wholeWord ? wrapWholeWord(source) : source, `${fold}u`);
  if (unicode.ok) return unicode;

  const legacy = compilePattern(opts.wholeWord ? wrapWholeWord(source, false) : source, fold);
  return legacy.ok ? legacy : unicode;
}
