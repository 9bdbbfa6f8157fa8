import { readFileSync } from 'node:fs';

/** Weight recorded against a listing that hits a reject pattern. */
export const REJECT_WEIGHT = -10;

export interface SignalPattern {
  /** Stable name reported in scoring results, independent of the regex. */
  label: string;
  pattern: RegExp;
  weight: number;
}

export interface PatternTables {
  reject: SignalPattern[];
  strong: SignalPattern[];
  medium: SignalPattern[];
  weak: SignalPattern[];
}

const DEFAULT_PATTERNS_FILE = new URL('../data/signal-patterns.json', import.meta.url);

function readTier(value: unknown, tier: string, fixedWeight: number | null): SignalPattern[] {
  if (!Array.isArray(value)) {
    throw new Error(`Pattern tier "${tier}" must be an array`);
  }

  return value.map((entry: unknown, i) => {
    if (typeof entry !== 'object' || entry === null) {
      throw new Error(`Pattern ${tier}[${i}] must be an object`);
    }
    const label = 'label' in entry ? entry.label : undefined;
    const source = 'pattern' in entry ? entry.pattern : undefined;
    const weight = 'weight' in entry ? entry.weight : undefined;

    if (typeof label !== 'string' || !label) {
      throw new Error(`Pattern ${tier}[${i}] is missing a label`);
    }
    if (typeof source !== 'string' || !source) {
      throw new Error(`Pattern ${tier}[${i}] (${label}) is missing a pattern`);
    }
    if (fixedWeight === null && (typeof weight !== 'number' || !Number.isFinite(weight))) {
      throw new Error(`Pattern ${tier}[${i}] (${label}) needs a numeric weight`);
    }

    return {
      label,
      pattern: new RegExp(source, 'i'),
      weight: fixedWeight ?? (typeof weight === 'number' ? weight : 0),
    };
  });
}

/** Parses a pattern table document; throws on a malformed entry or regex. */
export function parsePatternTables(document: unknown): PatternTables {
  if (typeof document !== 'object' || document === null) {
    throw new Error('Pattern document must be an object');
  }
  const tier = (name: string): unknown => (name in document ? Reflect.get(document, name) : undefined);

  return {
    reject: readTier(tier('reject'), 'reject', REJECT_WEIGHT),
    strong: readTier(tier('strong'), 'strong', null),
    medium: readTier(tier('medium'), 'medium', null),
    weak: readTier(tier('weak'), 'weak', null),
  };
}

export function loadPatternTables(file: URL | string = DEFAULT_PATTERNS_FILE): PatternTables {
  const document: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return parsePatternTables(document);
}

let defaults: PatternTables | null = null;

/** The shipped tables, read once on first use. */
export function defaultPatternTables(): PatternTables {
  if (!defaults) {
    defaults = loadPatternTables();
  }
  return defaults;
}
