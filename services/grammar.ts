import type { Correction, Language, VocabularyEntry } from '../types';
import { endsWithRieul, getLemmaCandidates, hasBatchim, particleFunction, tokenize } from './linguistics';
import type { Token } from './linguistics';
import { compileTemplate } from './rules';
import type { GrammarRule, RuleBook } from './rules';

const fill = (template: string, values: Record<string, string>): string =>
  template.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder);

// Endings that can follow a Korean verb stem inside one token
const KR_VERB_ENDING =
  /^(다|요|어|아|여|어요|아요|여요|었어요|았어요|었다|았다|습니다|니다|세요|으세요|네요|는다|고|지|지요|죠|어서|아서|면|으면)?$/u;

const JP_INFLECTION = /^(ましょう|ました|ません|ます|なかった|ない|たい|った|んだ|た|て|る|[うくぐすつぬぶむ])?/u;

/**
 * Stem the learner is likely to have inflected: 먹다 -> 먹, 食べる -> 食べ.
 */
const verbStem = (entry: VocabularyEntry): string => {
  const canonical = entry.canonicalForm;
  if (entry.language === 'KR') return canonical.endsWith('다') && canonical.length > 1 ? canonical.slice(0, -1) : canonical;
  return canonical.length > 1 ? canonical.slice(0, -1) : canonical;
};

const isKoreanVerbForm = (token: string, entry: VocabularyEntry, stem: string): boolean =>
  (token.startsWith(stem) && KR_VERB_ENDING.test(token.slice(stem.length))) ||
  getLemmaCandidates(token, 'KR').includes(entry.canonicalForm);

/**
 * Rule-driven checker. Rules are selected by language and the matched entry's part of
 * speech; a rule that throws is logged and skipped, so `check` never throws.
 */
export class GrammarCorrector {
  constructor(private readonly rules: RuleBook) {}

  rulesFor(entry: VocabularyEntry | null, language: Language): GrammarRule[] {
    return this.rules.grammar.filter((rule) => {
      if (rule.language !== language) return false;
      if (rule.partsOfSpeech.includes('*')) return true;
      return entry !== null && entry.language === language && rule.partsOfSpeech.includes(entry.partOfSpeech);
    });
  }

  check(text: string, entry: VocabularyEntry | null, language: Language): Correction[] {
    if (typeof text !== 'string' || !text.trim()) return [];

    const tokens = tokenize(text);
    const found: Correction[] = [];

    for (const rule of this.rulesFor(entry, language)) {
      try {
        found.push(...this.apply(rule, text, tokens, entry));
      } catch (error) {
        console.warn(`[Grammar] Rule "${rule.id}" failed on input and was skipped:`, error);
      }
    }

    const seen = new Set<string>();
    return found
      .filter((c) => {
        const key = `${c.ruleId}:${c.span.start}:${c.span.end}`;
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      })
      .sort((a, b) => a.span.start - b.span.start);
  }

  private apply(rule: GrammarRule, text: string, tokens: Token[], entry: VocabularyEntry | null): Correction[] {
    switch (rule.type) {
      case 'particle-harmony':
        return entry ? this.particleHarmony(rule, tokens, entry) : [];
      case 'missing-marker':
        return entry ? this.missingMarker(rule, tokens, entry) : [];
      case 'verb-final':
        return entry ? this.verbFinal(rule, text, tokens, entry) : [];
      case 'verb-form':
        return entry ? this.verbForm(rule, text, entry) : [];
      case 'pattern':
        return this.pattern(rule, text, entry);
    }
  }

  private particleHarmony(
    rule: Extract<GrammarRule, { type: 'particle-harmony' }>,
    tokens: Token[],
    entry: VocabularyEntry
  ): Correction[] {
    const stems = [...new Set([entry.surfaceForm, entry.canonicalForm])];
    const corrections: Correction[] = [];

    for (const token of tokens) {
      const stem = stems.find((s) => token.text.startsWith(s) && token.text.length > s.length);
      if (!stem) continue;
      const particle = token.text.slice(stem.length);
      const pair = rule.pairs.find((p) => p.afterConsonant === particle || p.afterVowel === particle);
      if (!pair) continue;

      const closed = hasBatchim(stem) && !(pair.rieulTakesVowelForm && endsWithRieul(stem));
      const expected = closed ? pair.afterConsonant : pair.afterVowel;
      if (expected === particle) continue;

      corrections.push({
        span: { start: token.start + stem.length, end: token.end, text: particle },
        issueKind: rule.issueKind,
        suggestion: stem + expected,
        explanation: fill(rule.explanation, {
          word: stem,
          expected,
          found: particle,
          function: (particleFunction(expected) ?? 'particle').toLowerCase(),
        }),
        ruleId: rule.id,
      });
    }

    return corrections;
  }

  private missingMarker(
    rule: Extract<GrammarRule, { type: 'missing-marker' }>,
    tokens: Token[],
    entry: VocabularyEntry
  ): Correction[] {
    const word = entry.surfaceForm;
    const closed = hasBatchim(word);
    const values = { word, topic: closed ? '은' : '는', object: closed ? '을' : '를' };

    return tokens
      .filter((token, i) => token.text === word && i < tokens.length - 1)
      .map((token) => ({
        span: { start: token.start, end: token.end, text: token.text },
        issueKind: rule.issueKind,
        suggestion: fill(rule.suggestion, values),
        explanation: fill(rule.explanation, values),
        ruleId: rule.id,
      }));
  }

  private verbFinal(
    rule: Extract<GrammarRule, { type: 'verb-final' }>,
    text: string,
    tokens: Token[],
    entry: VocabularyEntry
  ): Correction[] {
    const stem = verbStem(entry);

    if (rule.scope === 'token') {
      const verbIndex = tokens.findIndex((t) => isKoreanVerbForm(t.text, entry, stem));
      if (verbIndex < 0) return [];
      const objectAfter = tokens
        .slice(verbIndex + 1)
        .some((t) => rule.markers.some((m) => t.text.endsWith(m) && t.text.length > m.length));
      if (!objectAfter) return [];

      const verb = tokens[verbIndex];
      const reordered = [...tokens.filter((_, i) => i !== verbIndex), verb].map((t) => t.text).join(' ');
      return [{
        span: { start: verb.start, end: verb.end, text: verb.text },
        issueKind: rule.issueKind,
        suggestion: reordered,
        explanation: fill(rule.explanation, { word: verb.text }),
        ruleId: rule.id,
      }];
    }

    const start = text.indexOf(stem);
    if (start < 0) return [];
    const inflection = JP_INFLECTION.exec(text.slice(start + stem.length))?.[0] ?? '';
    const end = start + stem.length + inflection.length;
    const objectAfter = rule.markers.some((m) => text.indexOf(m, end) >= 0);
    if (!objectAfter) return [];

    const verb = text.slice(start, end);
    return [{
      span: { start, end, text: verb },
      issueKind: rule.issueKind,
      suggestion: `${text.slice(0, start)}${text.slice(end).trim()}${verb}`,
      explanation: fill(rule.explanation, { word: verb }),
      ruleId: rule.id,
    }];
  }

  masuFormOf(entry: VocabularyEntry): string | null {
    if (entry.language !== 'JP') return null;
    const { godanMasuStems, irregularMasu } = this.rules.conjugation;
    const canonical = entry.canonicalForm;

    if (irregularMasu[canonical]) return irregularMasu[canonical];
    const stem = canonical.slice(0, -1);
    switch (entry.metadata.verbGroup) {
      case 'ichidan':
        return canonical.endsWith('る') ? `${stem}ます` : null;
      case 'godan': {
        const iRow = godanMasuStems[canonical.slice(-1)];
        return iRow ? `${stem}${iRow}ます` : null;
      }
      default:
        return null;
    }
  }

  private verbForm(
    rule: Extract<GrammarRule, { type: 'verb-form' }>,
    text: string,
    entry: VocabularyEntry
  ): Correction[] {
    const masu = this.masuFormOf(entry);
    if (!masu) return [];

    const wrong = entry.canonicalForm + rule.after;
    const corrections: Correction[] = [];
    for (let at = text.indexOf(wrong); at >= 0; at = text.indexOf(wrong, at + wrong.length)) {
      corrections.push({
        span: { start: at, end: at + wrong.length, text: wrong },
        issueKind: rule.issueKind,
        suggestion: masu,
        explanation: fill(rule.explanation, { expected: masu, found: wrong, word: entry.canonicalForm }),
        ruleId: rule.id,
      });
    }
    return corrections;
  }

  private pattern(
    rule: Extract<GrammarRule, { type: 'pattern' }>,
    text: string,
    entry: VocabularyEntry | null
  ): Correction[] {
    const needsEntry = /\{(surface|canonical)\}/.test(rule.pattern);
    if (needsEntry && !entry) return [];

    const regex = compileTemplate(rule.pattern, {
      surface: entry?.surfaceForm ?? '',
      canonical: entry?.canonicalForm ?? '',
    });

    const corrections: Correction[] = [];
    for (const match of text.matchAll(regex)) {
      if (!match[0]) continue;
      const start = match.index ?? 0;
      const explanation = fill(rule.explanation, { match: match[0], word: entry?.surfaceForm ?? match[0] });
      corrections.push({
        span: { start, end: start + match[0].length, text: match[0] },
        issueKind: rule.issueKind,
        suggestion:
          rule.replacement === undefined
            ? explanation
            : match[0].replace(new RegExp(regex.source, 'u'), rule.replacement),
        explanation,
        ruleId: rule.id,
      });
    }
    return corrections;
  }
}
