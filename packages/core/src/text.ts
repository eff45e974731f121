// Cyrillic letters that render the same as Latin ones ("iРhоnе" for "iphone").
const LOOKALIKE_MAP: Record<string, string> = {
  "А": "A",
  "В": "B",
  "Е": "E",
  "К": "K",
  "М": "M",
  "Н": "H",
  "О": "O",
  "Р": "P",
  "С": "C",
  "Т": "T",
  "Х": "X",
  "У": "Y",
  "І": "I",
  "а": "a",
  "е": "e",
  "о": "o",
  "р": "p",
  "с": "c",
  "у": "y",
  "х": "x",
  "і": "i",
};
const LOOKALIKE_RE = new RegExp(`[${Object.keys(LOOKALIKE_MAP).join("")}]`, "g");

export function normalizeLookalikes(input: string): string {
  return input.replace(LOOKALIKE_RE, (m) => LOOKALIKE_MAP[m] ?? m);
}

export function normalizeForMatching(input: string, caseSensitive: boolean): string {
  const text = normalizeLookalikes(input);
  return caseSensitive ? text : text.toLowerCase();
}
