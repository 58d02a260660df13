import fs from 'node:fs';
import { ConfigLoadError, errorMessage } from '../errors';
import { isTldLabel } from './text-features';

export const DEFAULT_WARN_THRESHOLD = 4;
export const DEFAULT_DELETE_THRESHOLD = 8;
export const DEFAULT_NON_ENGLISH_THRESHOLD = 0.3;

export const DEFAULT_SUSPICIOUS_TLDS: readonly string[] = [
  'ru',
  'icu',
  'xyz',
  'top',
  'monster',
  'tk',
  'ml',
  'ga',
  'cf',
  'gq',
  'work',
  'click',
  'link',
  'loan',
  'win',
  'bid',
];

// Regex sources, matched case-insensitively in this order.
export const DEFAULT_SPAM_KEYWORDS: readonly string[] = [
  'free crypto',
  'airdrop',
  'giveaway',
  'claim now',
  'free btc',
  'free eth',
  'free tokens',
  'verify your account',
  'verification team',
  'verify now',
  'urgent action required',
  '\\b(xxx|18\\+|onlyfans)\\b',
  'hot singles',
  'dm me',
  'click here',
  'limited time',
  'act now',
  'congratulations you won',
  'prize winner',
  'double your',
  'investment opportunity',
  'make money fast',
  'work from home',
  'no experience needed',
];

export interface RuleConfig {
  readonly warnThreshold: number;
  readonly deleteThreshold: number;
  readonly suspiciousTlds: ReadonlySet<string>;
  readonly spamKeywords: readonly RegExp[];
  readonly checkNonEnglish: boolean;
  readonly nonEnglishRatioThreshold: number;
}

export interface RuleConfigOptions {
  warnThreshold?: number;
  deleteThreshold?: number;
  extraSuspiciousTlds?: readonly string[];
  spamKeywords?: readonly string[];
  checkNonEnglish?: boolean;
  nonEnglishRatioThreshold?: number;
}

export type RuleConfigSource = 'file' | 'missing' | 'invalid';

export interface RuleConfigLoadResult {
  config: RuleConfig;
  source: RuleConfigSource;
  errors: ConfigLoadError[];
}

function isNonNegativeInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isRatio(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeTld(value: string): string {
  return value.trim().toLowerCase().replace(/^\.+/, '');
}

export function createRuleConfig(options: RuleConfigOptions = {}): RuleConfig {
  const warnThreshold = options.warnThreshold ?? DEFAULT_WARN_THRESHOLD;
  const deleteThreshold = options.deleteThreshold ?? DEFAULT_DELETE_THRESHOLD;
  const nonEnglishRatioThreshold = options.nonEnglishRatioThreshold ?? DEFAULT_NON_ENGLISH_THRESHOLD;

  if (!isNonNegativeInt(warnThreshold) || !isNonNegativeInt(deleteThreshold) || warnThreshold > deleteThreshold) {
    throw new RangeError(`Invalid thresholds: warn=${warnThreshold} delete=${deleteThreshold}`);
  }

  if (!isRatio(nonEnglishRatioThreshold)) {
    throw new RangeError(`Invalid non-English ratio threshold: ${nonEnglishRatioThreshold}`);
  }

  const suspiciousTlds = new Set(DEFAULT_SUSPICIOUS_TLDS);
  for (const tld of options.extraSuspiciousTlds ?? []) {
    const normalized = normalizeTld(tld);
    if (!normalized) continue;
    if (!isTldLabel(normalized)) {
      throw new RangeError(`Invalid suspicious TLD: ${tld}`);
    }
    suspiciousTlds.add(normalized);
  }

  const spamKeywords = (options.spamKeywords ?? DEFAULT_SPAM_KEYWORDS).map((source) => new RegExp(source, 'i'));

  return Object.freeze({
    warnThreshold,
    deleteThreshold,
    suspiciousTlds,
    spamKeywords: Object.freeze(spamKeywords),
    checkNonEnglish: options.checkNonEnglish ?? true,
    nonEnglishRatioThreshold,
  });
}

function parseRuleFile(raw: Record<string, unknown>, filePath: string): { options: RuleConfigOptions; errors: ConfigLoadError[] } {
  const options: RuleConfigOptions = {};
  const errors: ConfigLoadError[] = [];
  const reject = (field: string, message: string): void => {
    errors.push({ kind: 'config_load', path: filePath, field, message });
  };

  if (raw.warn_threshold !== undefined) {
    if (isNonNegativeInt(raw.warn_threshold)) options.warnThreshold = raw.warn_threshold;
    else reject('warn_threshold', 'must be a non-negative integer');
  }

  if (raw.hard_delete_threshold !== undefined) {
    if (isNonNegativeInt(raw.hard_delete_threshold)) options.deleteThreshold = raw.hard_delete_threshold;
    else reject('hard_delete_threshold', 'must be a non-negative integer');
  }

  const warnThreshold = options.warnThreshold ?? DEFAULT_WARN_THRESHOLD;
  const deleteThreshold = options.deleteThreshold ?? DEFAULT_DELETE_THRESHOLD;
  if (warnThreshold > deleteThreshold) {
    reject('warn_threshold', `must not exceed hard_delete_threshold (${warnThreshold} > ${deleteThreshold})`);
    delete options.warnThreshold;
    delete options.deleteThreshold;
  }

  if (raw.suspicious_tlds !== undefined) {
    const tlds = raw.suspicious_tlds;
    if (Array.isArray(tlds) && tlds.every((item): item is string => typeof item === 'string')) {
      // Matching is on the last hostname label, so `co.uk` could never fire.
      options.extraSuspiciousTlds = tlds.filter((tld) => {
        const normalized = normalizeTld(tld);
        if (normalized === '' || isTldLabel(normalized)) return true;
        reject('suspicious_tlds', `"${tld}" is not a single top-level label`);
        return false;
      });
    } else {
      reject('suspicious_tlds', 'must be an array of strings');
    }
  }

  if (raw.check_non_english !== undefined) {
    if (typeof raw.check_non_english === 'boolean') options.checkNonEnglish = raw.check_non_english;
    else reject('check_non_english', 'must be a boolean');
  }

  if (raw.non_english_threshold !== undefined) {
    if (isRatio(raw.non_english_threshold)) options.nonEnglishRatioThreshold = raw.non_english_threshold;
    else reject('non_english_threshold', 'must be a number between 0 and 1');
  }

  return { options, errors };
}

/**
 * Reads the JSON rule file. Never throws: a missing file, unreadable JSON or
 * an invalid field falls back to the built-in defaults and is reported in
 * `errors`.
 */
export function loadRuleConfig(filePath: string): RuleConfigLoadResult {
  if (!fs.existsSync(filePath)) {
    return { config: createRuleConfig(), source: 'missing', errors: [] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    return {
      config: createRuleConfig(),
      source: 'invalid',
      errors: [{ kind: 'config_load', path: filePath, message: errorMessage(error) }],
    };
  }

  if (!isRecord(raw)) {
    return {
      config: createRuleConfig(),
      source: 'invalid',
      errors: [{ kind: 'config_load', path: filePath, message: 'root must be a JSON object' }],
    };
  }

  const { options, errors } = parseRuleFile(raw, filePath);
  return { config: createRuleConfig(options), source: 'file', errors };
}

export interface RuleSource {
  current(): RuleConfig;
}

export class RuleConfigHolder implements RuleSource {
  private config: RuleConfig;

  constructor(
    private readonly filePath: string,
    private readonly loader: (filePath: string) => RuleConfigLoadResult = loadRuleConfig,
    initial?: RuleConfigLoadResult,
  ) {
    this.config = (initial ?? this.loader(this.filePath)).config;
  }

  current(): RuleConfig {
    return this.config;
  }

  /** An unreadable file keeps the rules that are already active. */
  reload(): RuleConfigLoadResult {
    const result = this.loader(this.filePath);
    if (result.source !== 'invalid') {
      this.config = result.config;
    }
    return result;
  }
}
