const CODE_LENGTH = 4;

const DIGITS: Readonly<Record<string, string>> = {
  b: "1", f: "1", p: "1", v: "1",
  c: "2", g: "2", j: "2", k: "2", q: "2", s: "2", x: "2", z: "2",
  d: "3", t: "3",
  l: "4",
  m: "5", n: "5",
  r: "6",
};

/**
 * Soundex-like 4 character code used to bucket words that sound alike.
 *
 * - first char is the uppercased first letter
 * - consonants map to class digits, everything else (vowels included) is skipped
 * - runs of the same digit collapse to one, starting from the first char
 * - padded with "0" to exactly 4 chars; "" for empty input
 */
export function phoneticCode(word: string): string {
  if (!word.length) return "";

  let code = word.charAt(0).toUpperCase();
  let last = code;
  for (let i = 1; i < word.length && code.length < CODE_LENGTH; i++) {
    const digit = DIGITS[word.charAt(i).toLowerCase()];
    if (digit === undefined) continue;
    if (digit !== last) code += digit;
    last = digit;
  }

  return code.padEnd(CODE_LENGTH, "0");
}
