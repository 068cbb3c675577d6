import defaultReplies from '../data/replies.json';
import type { ComposedReply, ConversationContext, Correction, Intent, Language, VocabularyEntry } from '../types';
import { INTENTS } from '../types';
import { LoadError } from './errors';
import { analyzeKoreanStructure, romanize, tokenize } from './linguistics';
import type { MatchResult } from './matcher';

export interface ReplyTemplates {
  templates: Record<Intent, string[]>;
  noIssues: string;
  correctionLead: string;
  correctionLine: string;
  correctionHintLine: string;
  particleTip: string;
  cultureNote: string;
  followUps: string[];
  clarifications: string[];
}

export type ReplyBook = Record<Language, ReplyTemplates>;

export interface Composition {
  reply: ComposedReply;
  context: ConversationContext;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const fill = (template: string, values: Record<string, string>): string =>
  template.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder);

const line = (record: Record<string, unknown>, field: string, where: string): string => {
  const value = record[field];
  if (typeof value !== 'string' || !value) throw new LoadError(`Replies ${where}: "${field}" must be a non-empty string`);
  return value;
};

const lines = (value: unknown, where: string): string[] => {
  if (!Array.isArray(value) || value.length === 0 || !value.every((v): v is string => typeof v === 'string' && v !== '')) {
    throw new LoadError(`Replies ${where}: must be a non-empty list of strings`);
  }
  return value;
};

const parseTemplates = (raw: unknown, language: Language): ReplyTemplates => {
  if (!isRecord(raw)) throw new LoadError(`Replies ${language}: must be an object`);
  const rawTemplates = raw.templates;
  if (!isRecord(rawTemplates)) throw new LoadError(`Replies ${language}: "templates" must be an object`);

  const templates: Record<Intent, string[]> = {
    GREETING: lines(rawTemplates.GREETING, `${language}.templates.GREETING`),
    QUESTION: lines(rawTemplates.QUESTION, `${language}.templates.QUESTION`),
    STATEMENT: lines(rawTemplates.STATEMENT, `${language}.templates.STATEMENT`),
    CORRECTION_REQUEST: lines(rawTemplates.CORRECTION_REQUEST, `${language}.templates.CORRECTION_REQUEST`),
  };

  return {
    templates,
    noIssues: line(raw, 'noIssues', language),
    correctionLead: line(raw, 'correctionLead', language),
    correctionLine: line(raw, 'correctionLine', language),
    correctionHintLine: line(raw, 'correctionHintLine', language),
    particleTip: line(raw, 'particleTip', language),
    cultureNote: line(raw, 'cultureNote', language),
    followUps: lines(raw.followUps, `${language}.followUps`),
    clarifications: lines(raw.clarifications, `${language}.clarifications`),
  };
};

export const parseReplyBook = (raw: unknown): ReplyBook => {
  if (!isRecord(raw)) throw new LoadError('Reply book must be an object');
  return {
    KR: parseTemplates(raw.KR, 'KR'),
    JP: parseTemplates(raw.JP, 'JP'),
  };
};

let bundled: ReplyBook | null = null;

export const defaultReplyBook = (): ReplyBook => {
  if (!bundled) bundled = parseReplyBook(defaultReplies);
  return bundled;
};

const pick = <T>(items: readonly T[], turn: number): T => items[Math.abs(turn) % items.length];

/**
 * Romanization shown to the learner. Kanji surfaces use the kana reading when one exists.
 */
export const displayRomanization = (entry: VocabularyEntry): string => {
  if (entry.romanization) return entry.romanization;
  const source = entry.language === 'JP' ? entry.metadata.reading ?? entry.surfaceForm : entry.surfaceForm;
  return romanize(source, entry.language);
};

/**
 * Picks a clarification that differs from the previous one. The starting point is
 * derived from the recent intents so the same history always yields the same line.
 */
export const clarificationIndex = (context: ConversationContext, count: number): number => {
  if (count <= 1) return 0;
  const seed = context.recentIntents.reduce((sum, intent) => sum + INTENTS.indexOf(intent) + 1, 0);
  const index = seed % count;
  return index === context.lastClarificationIndex ? (index + 1) % count : index;
};

/**
 * Turns a match result and corrections into learner-facing text. Never throws: a
 * template failure degrades to the first clarification line.
 */
export class ResponseComposer {
  constructor(private readonly replies: ReplyBook = defaultReplyBook()) {}

  compose(
    result: MatchResult,
    corrections: Correction[],
    context: ConversationContext,
    language: Language,
    text = ''
  ): Composition {
    try {
      return this.build(result, corrections, context, language, text);
    } catch (error) {
      console.error('[Composer] Failed to build reply, falling back to clarification:', error);
      return {
        reply: {
          text: this.replies[language].clarifications[0],
          intent: result.intent,
          matched: false,
          corrections,
        },
        context,
      };
    }
  }

  private build(
    result: MatchResult,
    corrections: Correction[],
    context: ConversationContext,
    language: Language,
    text: string
  ): Composition {
    const book = this.replies[language];
    const parts: string[] = [];

    if (corrections.length > 0) {
      parts.push(book.correctionLead);
      for (const c of corrections) {
        const template = c.suggestion === c.explanation ? book.correctionHintLine : book.correctionLine;
        parts.push(fill(template, { found: c.span.text, suggestion: c.suggestion, explanation: c.explanation }));
      }
    }

    if (result.kind === 'NO_MATCH') {
      const index = clarificationIndex(context, book.clarifications.length);
      parts.push(book.clarifications[index]);
      return {
        reply: { text: parts.join('\n'), intent: result.intent, matched: false, corrections },
        context: { ...context, lastClarificationIndex: index },
      };
    }

    const entry = result.entry;
    const values = {
      surface: entry.surfaceForm,
      translation: entry.translation,
      romanization: displayRomanization(entry),
      example: entry.usageExamples[0] ?? entry.surfaceForm,
    };

    if (result.intent === 'CORRECTION_REQUEST' && corrections.length === 0) parts.push(book.noIssues);
    parts.push(fill(pick(book.templates[result.intent], context.turnCount), values));

    const tip = language === 'KR' ? this.particleTip(book, entry, corrections, text) : null;
    if (tip) parts.push(tip);
    if (entry.culturalNote) parts.push(fill(book.cultureNote, { note: entry.culturalNote }));
    parts.push(fill(pick(book.followUps, context.turnCount), values));

    return {
      reply: {
        text: parts.join('\n'),
        intent: result.intent,
        matched: true,
        corrections,
        culturalNote: entry.culturalNote,
      },
      context,
    };
  }

  // Explains a particle the learner attached correctly to the matched noun
  private particleTip(
    book: ReplyTemplates,
    entry: VocabularyEntry,
    corrections: Correction[],
    text: string
  ): string | null {
    if (corrections.some((c) => c.issueKind === 'PARTICLE_HARMONY')) return null;
    for (const token of tokenize(text)) {
      const structure = analyzeKoreanStructure(token.text);
      if (structure && structure.root === entry.surfaceForm) {
        return fill(book.particleTip, {
          token: token.text,
          root: structure.root,
          particle: structure.particle,
          function: structure.function.toLowerCase(),
        });
      }
    }
    return null;
  }
}
