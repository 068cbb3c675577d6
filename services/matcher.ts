import type { ConversationContext, Intent, Language, ProficiencyLevel, VocabularyEntry } from '../types';
import { tierIndex } from '../types';
import type { TutorConfig } from './config';
import type { VocabularyCorpus } from './corpus';
import { hasKana, hasKanji, normalizeToken, segmentByLongestMatch, tokenize } from './linguistics';
import type { RuleBook } from './rules';

export interface ScoredCandidate {
  entry: VocabularyEntry;
  score: number;
  overlap: number;
  proximity: number;
  continuity: number;
}

export type MatchResult =
  | {
      kind: 'MATCH';
      intent: Intent;
      entry: VocabularyEntry;
      score: number;
      tokens: string[];
      candidates: ScoredCandidate[];
    }
  | {
      kind: 'NO_MATCH';
      intent: Intent;
      tokens: string[];
      candidates: ScoredCandidate[];
    };

export interface MatchOutcome {
  result: MatchResult;
  context: ConversationContext;
}

const JP_PARTICLES = new Set(['は', 'が', 'を', 'に', 'で', 'へ', 'と', 'も', 'の']);

interface Tally {
  entry: VocabularyEntry;
  overlapSum: number;
  phrase: number;
}

/**
 * Maps learner text onto corpus entries. Pure with respect to its inputs: the corpus
 * snapshot is passed per call and the updated context is returned, never stored.
 */
export class MatchEngine {
  constructor(
    private readonly rules: RuleBook,
    private readonly config: TutorConfig
  ) {}

  classifyIntent(text: string): Intent {
    const subject = text.normalize('NFKC').trim().toLowerCase();
    if (!subject) return 'STATEMENT';
    for (const rule of this.rules.intents) {
      if (rule.patterns.some((p) => p.test(subject))) return rule.intent;
    }
    return 'STATEMENT';
  }

  tokensFor(text: string, language: Language, corpus: VocabularyCorpus): string[] {
    const tokens = tokenize(text).map((t) => t.normalized);
    if (language !== 'JP') return tokens;

    const maxKey = Math.max(1, corpus.maxKeyLength('JP'));
    return tokens
      .flatMap((t) =>
        hasKana(t) || hasKanji(t) ? segmentByLongestMatch(t, (c) => corpus.hasKey(c, 'JP'), maxKey) : [t]
      )
      .flatMap((segment) =>
        segment.length > 1 && JP_PARTICLES.has(segment[0]) && !corpus.hasKey(segment, 'JP')
          ? [segment[0], segment.slice(1)]
          : [segment]
      );
  }

  match(
    text: string,
    language: Language,
    context: ConversationContext,
    level: ProficiencyLevel,
    corpus: VocabularyCorpus
  ): MatchOutcome {
    const intent = this.classifyIntent(text);
    const tokens = this.tokensFor(text, language, corpus);
    const candidates = this.score(text, tokens, language, context, level, corpus);
    const best = candidates[0];

    const matched = best !== undefined && best.score >= this.config.matching.minScore;
    const result: MatchResult = matched
      ? { kind: 'MATCH', intent, entry: best.entry, score: best.score, tokens, candidates }
      : { kind: 'NO_MATCH', intent, tokens, candidates };

    const limit = this.config.conversation.recentIntentsLimit;
    const next: ConversationContext = {
      ...context,
      turnCount: context.turnCount + 1,
      recentIntents: [...context.recentIntents, intent].slice(-limit),
      lastMatchedEntryId: result.kind === 'MATCH' ? result.entry.id : context.lastMatchedEntryId,
    };

    return { result, context: next };
  }

  private score(
    text: string,
    tokens: string[],
    language: Language,
    context: ConversationContext,
    level: ProficiencyLevel,
    corpus: VocabularyCorpus
  ): ScoredCandidate[] {
    const { weights, variantQuality } = this.config.matching;
    const qualityOf = (quality: 'exact' | 'variant') => (quality === 'exact' ? 1 : variantQuality);
    const tallies = new Map<string, Tally>();

    const tallyFor = (entry: VocabularyEntry): Tally => {
      const existing = tallies.get(entry.id);
      if (existing) return existing;
      const created: Tally = { entry, overlapSum: 0, phrase: 0 };
      tallies.set(entry.id, created);
      return created;
    };

    for (const token of tokens) {
      for (const hit of corpus.lookupDetailed(token, language)) {
        tallyFor(hit.entry).overlapSum += qualityOf(hit.quality);
      }
    }

    // Multi-word phrases ("잘 지내요", "arigatou gozaimasu") only match on the whole input
    if (tokens.length > 1) {
      for (const hit of corpus.lookupDetailed(normalizeToken(text), language)) {
        const tally = tallyFor(hit.entry);
        tally.phrase = Math.max(tally.phrase, qualityOf(hit.quality));
      }
    }

    const preferred = tierIndex(this.config.rating.preferredTierByLevel[level]);
    const tokenCount = Math.max(1, tokens.length);

    return [...tallies.values()]
      .map(({ entry, overlapSum, phrase }) => {
        const overlap = Math.max(Math.min(1, overlapSum / tokenCount), phrase);
        const proximity = 1 - Math.abs(tierIndex(entry.difficultyTier) - preferred) / 2;
        const continuity = entry.intents?.some((i) => context.recentIntents.includes(i)) ? 1 : 0;
        const score =
          weights.overlap * overlap + weights.tierProximity * proximity + weights.continuity * continuity;
        return { entry, score, overlap, proximity, continuity };
      })
      .sort(
        (a, b) =>
          b.score - a.score ||
          tierIndex(a.entry.difficultyTier) - tierIndex(b.entry.difficultyTier) ||
          corpus.ordinalOf(a.entry.id) - corpus.ordinalOf(b.entry.id)
      );
  }
}
