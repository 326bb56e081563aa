/**
 * Entity Dictionary
 *
 * Canonical values per dimension, aliases, dimension words and fuzzy
 * stopwords. Loaded from entity-dictionary.json, validated once with zod and
 * frozen; callers receive the same immutable instance.
 */

import { z } from 'zod';
import dictionaryData from './entity-dictionary.json';
import { ConfigError } from '../common/errors.js';

// =============================================================================
// SCHEMA
// =============================================================================

const valueList = z.array(z.string().min(1)).min(1);
const aliasMap = z.record(z.string());

const valuesSchema = z.object({
  merchant_category: valueList,
  state: valueList,
  bank: valueList,
  age_group: valueList,
  device_type: valueList,
  network_type: valueList,
  transaction_type: valueList,
  transaction_status: valueList,
});

const aliasesSchema = z.object({
  merchant_category: aliasMap,
  state: aliasMap,
  bank: aliasMap,
  age_group: aliasMap,
  device_type: aliasMap,
  network_type: aliasMap,
  transaction_type: aliasMap,
  transaction_status: aliasMap,
});

const dimensionWordsSchema = z.object({
  merchant_category: valueList,
  state: valueList,
  bank: valueList,
  age_group: valueList,
  device_type: valueList,
  network_type: valueList,
  transaction_type: valueList,
  transaction_status: valueList,
  hour_of_day: valueList,
  day_of_week: valueList,
});

// =============================================================================
// TYPES
// =============================================================================

/**
 * Dimensions with canonical value lists
 */
export type DictionaryDimension = keyof z.infer<typeof valuesSchema>;

/**
 * Dimensions a bare word ("banks", "categories") can name
 */
export type DimensionWordKey = keyof z.infer<typeof dimensionWordsSchema>;

export const DICTIONARY_DIMENSIONS: readonly DictionaryDimension[] = [
  'merchant_category',
  'state',
  'bank',
  'age_group',
  'device_type',
  'network_type',
  'transaction_type',
  'transaction_status',
];

export const DIMENSION_WORD_KEYS: readonly DimensionWordKey[] = [...DICTIONARY_DIMENSIONS, 'hour_of_day', 'day_of_week'];

/**
 * Order in which dictionaries are tried. Also the fuzzy tie-break: when two
 * dictionaries score the same, the earlier one wins.
 */
export const DECLARED_ORDER: readonly DictionaryDimension[] = [
  'merchant_category',
  'state',
  'bank',
  'device_type',
  'network_type',
  'transaction_type',
];

export const EntityDictionarySchema = z
  .object({
    version: z.string(),
    values: valuesSchema,
    aliases: aliasesSchema,
    dimension_words: dimensionWordsSchema,
    stopwords: z.array(z.string()),
  })
  .superRefine((data, ctx) => {
    for (const dimension of DICTIONARY_DIMENSIONS) {
      const canonical = new Set(data.values[dimension]);
      for (const [alias, target] of Object.entries(data.aliases[dimension])) {
        if (!canonical.has(target)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['aliases', dimension, alias],
            message: `Alias target "${target}" is not a ${dimension} value`,
          });
        }
      }
    }
  });

export interface EntityDictionary {
  readonly version: string;
  readonly values: Readonly<Record<DictionaryDimension, readonly string[]>>;
  /** Alias keys are lower-case */
  readonly aliases: Readonly<Record<DictionaryDimension, Readonly<Record<string, string>>>>;
  /** Longest phrase first, so "age groups" is tried before "age" */
  readonly dimensionWords: Readonly<Record<DimensionWordKey, readonly string[]>>;
  readonly stopwords: ReadonlySet<string>;
}

// =============================================================================
// LOADING
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}

function lowerKeys(map: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(map).map(([alias, target]) => [alias.toLowerCase(), target]));
}

/**
 * Validate raw dictionary data and build the immutable dictionary
 *
 * @throws ConfigError when the data does not match the schema
 */
export function loadEntityDictionary(raw: unknown = dictionaryData): EntityDictionary {
  const parsed = EntityDictionarySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid entity dictionary: ${issues}`);
  }

  const data = parsed.data;

  const aliases = { ...data.aliases };
  for (const dimension of DICTIONARY_DIMENSIONS) {
    aliases[dimension] = lowerKeys(aliases[dimension]);
  }

  const dimensionWords = { ...data.dimension_words };
  for (const key of DIMENSION_WORD_KEYS) {
    dimensionWords[key] = [...dimensionWords[key]].map((w) => w.toLowerCase()).sort((a, b) => b.length - a.length);
  }

  return deepFreeze({
    version: data.version,
    values: data.values,
    aliases,
    dimensionWords,
    stopwords: new Set(data.stopwords.map((w) => w.toLowerCase())),
  });
}

let dictionaryInstance: EntityDictionary | null = null;

/**
 * Process-wide dictionary (built on first use)
 */
export function getEntityDictionary(): EntityDictionary {
  if (!dictionaryInstance) {
    dictionaryInstance = loadEntityDictionary();
  }
  return dictionaryInstance;
}
