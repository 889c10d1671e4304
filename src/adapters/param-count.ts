// Parameter sizes as they appear in model metadata: "7b", "1.5B", "135m",
// "7 billion", "7,000,000,000", "500k", "7e9". Unparseable input is 0.

const WORD_SUFFIXES: ReadonlyArray<readonly [string, number]> = [
  ['billion', 1e9],
  ['million', 1e6],
  ['thousand', 1e3],
  ['k', 1e3],
];

const LETTER_SUFFIXES: Readonly<Record<string, number>> = {
  b: 1e9,
  m: 1e6,
  t: 1e12,
};

const UNSIGNED_DECIMAL = /^(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/;

function parseDecimal(text: string): number | undefined {
  if (!UNSIGNED_DECIMAL.test(text)) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

function scale(value: number, multiplier: number): number {
  // 1.7 * 1e9 is 1700000000.0000002 in floating point.
  return multiplier === 1 ? Math.trunc(value) : Math.round(value * multiplier);
}

/** The digits of `text` with at most one decimal point, everything else dropped. */
function digitsOf(text: string): string {
  let numeral = '';
  let seenDot = false;
  for (const ch of text) {
    if (ch >= '0' && ch <= '9') {
      numeral += ch;
    } else if (ch === '.' && !seenDot) {
      numeral += ch;
      seenDot = true;
    }
  }
  return numeral;
}

export function parseParamCount(size: string): number {
  const cleaned = size.toLowerCase().replace(/[,\s]/g, '');
  if (!cleaned) return 0;

  for (const [suffix, multiplier] of WORD_SUFFIXES) {
    if (!cleaned.endsWith(suffix)) continue;
    const value = parseDecimal(cleaned.slice(0, -suffix.length));
    if (value !== undefined) return scale(value, multiplier);
  }

  let rest = cleaned;
  let multiplier = 1;
  const letter = LETTER_SUFFIXES[cleaned.slice(-1)];
  if (letter !== undefined) {
    rest = cleaned.slice(0, -1);
    multiplier = letter;
    const value = parseDecimal(rest);
    if (value !== undefined) return scale(value, multiplier);
  }

  const value = parseDecimal(rest) ?? parseDecimal(digitsOf(rest));
  if (value === undefined) return 0;

  // Terse sizes such as "7" mean 7B. This misreads genuinely small bare
  // counts ("500" is read as 500B).
  if (multiplier === 1 && value < 1000) multiplier = 1e9;
  return scale(value, multiplier);
}

const DISPLAY_UNITS: ReadonlyArray<readonly [number, string]> = [
  [1e12, 'T'],
  [1e9, 'B'],
  [1e6, 'M'],
  [1e3, 'K'],
];

/** Terse display form of a parameter count: 7000000000 → "7B", 1500000000 → "1.5B". */
export function formatParamCount(count: number): string {
  for (const [unit, suffix] of DISPLAY_UNITS) {
    if (count >= unit) {
      return `${Math.round((count / unit) * 10) / 10}${suffix}`;
    }
  }
  return String(Math.max(0, Math.trunc(count)));
}
