import combiningMarkRanges from './combining-marks.json';

const ZERO_WIDTH_CHARS = new Set(['\u200b', '\u200c', '\u200d', '\u2060', '\ufeff']);
const BIDI_OVERRIDE_CHARS = new Set(['\u202e', '\u202d']);
const COMBINING_MARK_MAX_SHARE = 0.1;

const WHITESPACE_REGEX = /\s/u;
const DIGIT_REGEX = /\p{Nd}/u;
const IGNORED_SYMBOLS = new Set(
  Array.from('!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~«»“”„‘’‚‹›–—…·•№§©®™°±×÷€£¥₽'),
);

const NON_LATIN_SCRIPT_REGEX = /[\p{Script=Cyrillic}\p{Script=Arabic}\p{Script=Hebrew}\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}\p{Script=Devanagari}\p{Script=Thai}\p{Script=Greek}]/u;

// Inclusive code point ranges, checked when the script property lookup misses.
const NON_LATIN_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x0370, 0x03ff], // Greek
  [0x0400, 0x052f], // Cyrillic + supplement
  [0x0590, 0x05ff], // Hebrew
  [0x0600, 0x06ff], // Arabic
  [0x0750, 0x077f], // Arabic supplement
  [0x0900, 0x097f], // Devanagari
  [0x0e00, 0x0e7f], // Thai
  [0x1100, 0x11ff], // Hangul jamo
  [0x3040, 0x309f], // Hiragana
  [0x30a0, 0x30ff], // Katakana
  [0x3400, 0x4dbf], // CJK extension A
  [0x4e00, 0x9fff], // CJK unified
  [0xac00, 0xd7af], // Hangul syllables
];

function inNonLatinRange(codePoint: number): boolean {
  return NON_LATIN_RANGES.some(([from, to]) => codePoint >= from && codePoint <= to);
}

/**
 * True for code points with a non-zero canonical combining class. Spacing
 * vowel signs of Indic and Thai scripts are class 0 and do not count, even
 * though they are `\p{M}`.
 */
export function isCombiningMark(char: string): boolean {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) return false;

  let low = 0;
  let high = combiningMarkRanges.length - 1;
  while (low <= high) {
    const middle = (low + high) >> 1;
    const [from, to] = combiningMarkRanges[middle];
    if (codePoint < from) {
      high = middle - 1;
    } else if (codePoint > to) {
      low = middle + 1;
    } else {
      return true;
    }
  }

  return false;
}

export function isNonLatinScript(char: string): boolean {
  if (NON_LATIN_SCRIPT_REGEX.test(char)) {
    return true;
  }

  const codePoint = char.codePointAt(0);
  return codePoint !== undefined && inNonLatinRange(codePoint);
}

export function hasUnicodeTricks(text: string): boolean {
  const chars = Array.from(text);

  if (chars.some((char) => ZERO_WIDTH_CHARS.has(char))) {
    return true;
  }

  const combiningCount = chars.filter(isCombiningMark).length;
  if (combiningCount > chars.length * COMBINING_MARK_MAX_SHARE) {
    return true;
  }

  return chars.some((char) => BIDI_OVERRIDE_CHARS.has(char));
}

/**
 * Share of non-Latin-script characters once whitespace, digits and common
 * punctuation are removed. `null` when nothing is left to classify.
 */
export function nonLatinRatio(text: string): number | null {
  const cleaned = Array.from(text).filter((char) => (
    !WHITESPACE_REGEX.test(char)
    && !DIGIT_REGEX.test(char)
    && !IGNORED_SYMBOLS.has(char)
  ));

  if (cleaned.length === 0) {
    return null;
  }

  const nonLatinCount = cleaned.filter(isNonLatinScript).length;
  return nonLatinCount / cleaned.length;
}

export function hasNonEnglishText(text: string, threshold: number): boolean {
  const ratio = nonLatinRatio(text);
  return ratio !== null && ratio >= threshold;
}
