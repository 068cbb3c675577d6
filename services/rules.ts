import defaultRules from '../data/grammar-rules.json';
import type { Intent, IssueKind, Language } from '../types';
import { isIntent, isLanguage } from '../types';
import { LoadError } from './errors';

export interface ParticlePair {
  afterConsonant: string;
  afterVowel: string;
  rieulTakesVowelForm: boolean;
}

interface RuleBase {
  id: string;
  language: Language;
  partsOfSpeech: string[]; // "*" matches any entry, and no entry at all
  issueKind: IssueKind;
  explanation: string;
}

export type GrammarRule =
  | (RuleBase & { type: 'particle-harmony'; pairs: ParticlePair[] })
  | (RuleBase & { type: 'missing-marker'; suggestion: string })
  | (RuleBase & { type: 'verb-final'; markers: string[]; scope: 'token' | 'text' })
  | (RuleBase & { type: 'verb-form'; after: string; form: 'masu' })
  | (RuleBase & { type: 'pattern'; pattern: string; replacement?: string });

export interface IntentRule {
  intent: Intent;
  patterns: RegExp[];
}

export interface RuleBook {
  intents: IntentRule[];
  grammar: GrammarRule[];
  conjugation: {
    godanMasuStems: Record<string, string>;
    irregularMasu: Record<string, string>;
  };
}

const ISSUE_KINDS: readonly IssueKind[] = [
  'PARTICLE_HARMONY',
  'MISSING_PARTICLE',
  'WORD_ORDER',
  'CONJUGATION',
  'SPEECH_LEVEL',
  'PATTERN',
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isIssueKind = (value: unknown): value is IssueKind => ISSUE_KINDS.some((k) => k === value);

const isScope = (value: unknown): value is 'token' | 'text' => value === 'token' || value === 'text';

const fail = (where: string, reason: string): never => {
  throw new LoadError(`Rule ${where}: ${reason}`);
};

const text = (record: Record<string, unknown>, field: string, where: string): string => {
  const value = record[field];
  if (typeof value !== 'string' || !value) return fail(where, `"${field}" must be a non-empty string`);
  return value;
};

const texts = (record: Record<string, unknown>, field: string, where: string): string[] => {
  const value = record[field];
  if (!Array.isArray(value) || value.length === 0 || !value.every((v): v is string => typeof v === 'string' && v !== '')) {
    return fail(where, `"${field}" must be a non-empty list of strings`);
  }
  return value;
};

const stringTable = (value: unknown, where: string): Record<string, string> => {
  if (!isRecord(value)) return fail(where, 'must be an object of strings');
  const table: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== 'string') return fail(where, `value for "${key}" must be a string`);
    table[key] = v;
  }
  return table;
};

/**
 * Regex templates may reference {surface} and {canonical}; they are substituted
 * per matched entry, so the template is checked here with a stand-in value.
 */
export const compileTemplate = (pattern: string, values: { surface: string; canonical: string }): RegExp => {
  const escape = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const source = pattern
    .replace(/\{surface\}/g, escape(values.surface))
    .replace(/\{canonical\}/g, escape(values.canonical));
  return new RegExp(source, 'gu');
};

const parseGrammarRule = (raw: unknown, i: number): GrammarRule => {
  if (!isRecord(raw)) return fail(`#${i}`, 'must be an object');
  const id = text(raw, 'id', `#${i}`);
  const where = `"${id}"`;

  const language = raw.language;
  if (!isLanguage(language)) return fail(where, `unknown language "${String(language)}"`);
  const issueKind = raw.issueKind;
  if (!isIssueKind(issueKind)) return fail(where, `unknown issue kind "${String(issueKind)}"`);

  const base: RuleBase = {
    id,
    language,
    issueKind,
    partsOfSpeech: texts(raw, 'partsOfSpeech', where).map((p) => p.toLowerCase()),
    explanation: text(raw, 'explanation', where),
  };

  switch (raw.type) {
    case 'particle-harmony': {
      const pairs = raw.pairs;
      if (!Array.isArray(pairs) || pairs.length === 0) return fail(where, '"pairs" must be a non-empty list');
      return {
        ...base,
        type: 'particle-harmony',
        pairs: pairs.map((pair): ParticlePair => {
          if (!isRecord(pair)) return fail(where, 'each pair must be an object');
          return {
            afterConsonant: text(pair, 'afterConsonant', where),
            afterVowel: text(pair, 'afterVowel', where),
            rieulTakesVowelForm: pair.rieulTakesVowelForm === true,
          };
        }),
      };
    }
    case 'missing-marker':
      return { ...base, type: 'missing-marker', suggestion: text(raw, 'suggestion', where) };
    case 'verb-final': {
      const scope = raw.scope ?? 'token';
      if (!isScope(scope)) return fail(where, `unknown scope "${String(scope)}"`);
      return { ...base, type: 'verb-final', markers: texts(raw, 'markers', where), scope };
    }
    case 'verb-form':
      if (raw.form !== 'masu') return fail(where, `unsupported form "${String(raw.form)}"`);
      return { ...base, type: 'verb-form', after: text(raw, 'after', where), form: 'masu' };
    case 'pattern': {
      const pattern = text(raw, 'pattern', where);
      try {
        compileTemplate(pattern, { surface: 'x', canonical: 'x' });
      } catch (error) {
        return fail(where, `invalid pattern: ${String(error)}`);
      }
      const rawReplacement = raw.replacement;
      const replacement = typeof rawReplacement === 'string' ? rawReplacement : undefined;
      if (rawReplacement !== undefined && replacement === undefined) {
        return fail(where, '"replacement" must be a string');
      }
      return { ...base, type: 'pattern', pattern, replacement };
    }
    default:
      return fail(where, `unknown rule type "${String(raw.type)}"`);
  }
};

const parseIntentRule = (raw: unknown, i: number): IntentRule => {
  if (!isRecord(raw)) return fail(`intent #${i}`, 'must be an object');
  const intent = raw.intent;
  if (!isIntent(intent)) return fail(`intent #${i}`, `unknown intent "${String(intent)}"`);
  const patterns = texts(raw, 'patterns', `intent ${intent}`).map((p) => {
    try {
      return new RegExp(p, 'iu');
    } catch (error) {
      return fail(`intent ${intent}`, `invalid pattern "${p}": ${String(error)}`);
    }
  });
  return { intent, patterns };
};

/**
 * Validates a rule table. Bad shapes and bad regexes fail the load.
 */
export const parseRuleBook = (raw: unknown): RuleBook => {
  if (!isRecord(raw)) throw new LoadError('Rule book must be an object');
  const intents = Array.isArray(raw.intents) ? raw.intents : [];
  const grammar = Array.isArray(raw.grammar) ? raw.grammar : [];

  const grammarRules = grammar.map(parseGrammarRule);
  const seen = new Set<string>();
  for (const rule of grammarRules) {
    if (seen.has(rule.id)) throw new LoadError(`Duplicate rule id "${rule.id}"`);
    seen.add(rule.id);
  }

  const rawConjugation = raw.conjugation;
  const conjugation: Record<string, unknown> = isRecord(rawConjugation) ? rawConjugation : {};
  return {
    intents: intents.map(parseIntentRule),
    grammar: grammarRules,
    conjugation: {
      godanMasuStems: stringTable(conjugation.godanMasuStems ?? {}, 'conjugation.godanMasuStems'),
      irregularMasu: stringTable(conjugation.irregularMasu ?? {}, 'conjugation.irregularMasu'),
    },
  };
};

let bundled: RuleBook | null = null;

export const defaultRuleBook = (): RuleBook => {
  if (!bundled) bundled = parseRuleBook(defaultRules);
  return bundled;
};
