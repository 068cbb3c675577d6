import { beforeAll, describe, expect, it, vi } from 'vitest';
import { sampleCorpus } from '../index';
import type { VocabularyEntry } from '../types';
import { loadCorpus, parseEntry } from './corpus';
import type { VocabularyCorpus } from './corpus';
import { LoadError } from './errors';
import { GrammarCorrector } from './grammar';
import { defaultRuleBook, parseRuleBook } from './rules';

let corpus: VocabularyCorpus;
const grammar = new GrammarCorrector(defaultRuleBook());

const entry = (id: string): VocabularyEntry => {
  const found = corpus.getById(id);
  if (!found) throw new Error(`missing fixture ${id}`);
  return found;
};

beforeAll(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  corpus = loadCorpus(sampleCorpus);
});

describe('Korean particle harmony', () => {
  it('flags a vowel-form particle after a closed syllable', () => {
    expect(grammar.check('책는 재미있어요', entry('kr-chaek'), 'KR')).toEqual([
      {
        span: { start: 1, end: 2, text: '는' },
        issueKind: 'PARTICLE_HARMONY',
        suggestion: '책은',
        explanation: 'After "책" the topic marker is "은", not "는".',
        ruleId: 'kr-particle-harmony',
      },
    ]);
  });

  it('treats a final ㄹ as open before 로', () => {
    const [correction] = grammar.check('물으로 씻어요', entry('kr-mul'), 'KR');
    expect(correction.suggestion).toBe('물로');
    expect(correction.span).toEqual({ start: 1, end: 3, text: '으로' });
    expect(grammar.check('물로 씻어요', entry('kr-mul'), 'KR')).toEqual([]);
  });

  it('accepts the right particle', () => {
    expect(grammar.check('사과를 주세요', entry('kr-sagwa'), 'KR')).toEqual([]);
  });
});

describe('Korean missing particle', () => {
  it('suggests topic and object markers for a bare noun', () => {
    expect(grammar.check('사과 먹어요', entry('kr-sagwa'), 'KR')).toEqual([
      {
        span: { start: 0, end: 2, text: '사과' },
        issueKind: 'MISSING_PARTICLE',
        suggestion: '사과는 / 사과를',
        explanation: '"사과" needs a particle here, for example a topic (은/는) or object (을/를) marker.',
        ruleId: 'kr-missing-particle',
      },
    ]);
  });

  it('leaves a one-word message alone', () => {
    expect(grammar.check('사과', entry('kr-sagwa'), 'KR')).toEqual([]);
  });
});

describe('Korean verbs', () => {
  it('moves the verb after its object', () => {
    expect(grammar.check('먹어요 사과를', entry('kr-meokda'), 'KR')).toEqual([
      {
        span: { start: 0, end: 3, text: '먹어요' },
        issueKind: 'WORD_ORDER',
        suggestion: '사과를 먹어요',
        explanation: 'Korean puts the verb at the end: move "먹어요" after the object.',
        ruleId: 'kr-verb-final',
      },
    ]);
  });

  it('only reorders tokens that are forms of the verb', () => {
    const hada = parseEntry(
      { id: 'kr-hada', language: 'KR', surfaceForm: '하다', translation: 'to do', partOfSpeech: 'verb', difficultyTier: 'BEGINNER' },
      0
    );
    const gada = parseEntry(
      { id: 'kr-gada', language: 'KR', surfaceForm: '가다', translation: 'to go', partOfSpeech: 'verb', difficultyTier: 'BEGINNER' },
      1
    );
    const wordOrder = (text: string, verb: VocabularyEntry) =>
      grammar.check(text, verb, 'KR').filter((c) => c.ruleId === 'kr-verb-final');

    expect(wordOrder('하지만 사과를 먹어요', hada)).toEqual([]);
    expect(wordOrder('가방을 사요 빵을', gada)).toEqual([]);
    expect(wordOrder('해요 숙제를', hada)).toEqual([
      {
        span: { start: 0, end: 2, text: '해요' },
        issueKind: 'WORD_ORDER',
        suggestion: '숙제를 해요',
        explanation: 'Korean puts the verb at the end: move "해요" after the object.',
        ruleId: 'kr-verb-final',
      },
    ]);
  });

  it('points out the dictionary form at the end of a sentence', () => {
    const explanation = '"먹다" is the dictionary form. In conversation use a polite ending such as -아요/-어요.';
    expect(grammar.check('사과를 먹다', entry('kr-meokda'), 'KR')).toEqual([
      {
        span: { start: 4, end: 6, text: '먹다' },
        issueKind: 'SPEECH_LEVEL',
        suggestion: explanation,
        explanation,
        ruleId: 'kr-dictionary-form',
      },
    ]);
  });

  it('applies entry-independent rules without a match', () => {
    expect(grammar.check('감사합니다요', null, 'KR')).toEqual([
      {
        span: { start: 3, end: 6, text: '니다요' },
        issueKind: 'CONJUGATION',
        suggestion: '니다',
        explanation: 'The formal ending -(스)ㅂ니다 is complete on its own; drop the extra 요.',
        ruleId: 'kr-double-ending',
      },
    ]);
  });
});

describe('Japanese verbs', () => {
  it('replaces dictionary form plus です with the ます form', () => {
    expect(grammar.check('食べるです', entry('jp-taberu'), 'JP')).toEqual([
      {
        span: { start: 0, end: 5, text: '食べるです' },
        issueKind: 'CONJUGATION',
        suggestion: '食べます',
        explanation: 'Verbs do not take です. Use the ます form "食べます" instead of "食べるです".',
        ruleId: 'jp-dictionary-form-desu',
      },
    ]);
  });

  it('conjugates godan verbs through the i-row', () => {
    expect(grammar.masuFormOf(entry('jp-nomu'))).toBe('飲みます');
    expect(grammar.masuFormOf(entry('jp-mizu'))).toBeNull();
  });

  it('moves the verb after the を object', () => {
    expect(grammar.check('食べるりんごを', entry('jp-taberu'), 'JP')).toEqual([
      {
        span: { start: 0, end: 3, text: '食べる' },
        issueKind: 'WORD_ORDER',
        suggestion: 'りんごを食べる',
        explanation: 'Japanese puts the verb at the end: the object marked with を comes before "食べる".',
        ruleId: 'jp-verb-final',
      },
    ]);
  });

  it('collapses a doubled polite ending', () => {
    const [correction] = grammar.check('水ですです', entry('jp-mizu'), 'JP');
    expect(correction.suggestion).toBe('です');
    expect(correction.ruleId).toBe('jp-double-desu');
  });
});

describe('GrammarCorrector', () => {
  it('only selects rules for the entry part of speech', () => {
    const ids = grammar.rulesFor(entry('kr-annyeong'), 'KR').map((r) => r.id);
    expect(ids).toEqual(['kr-double-ending']);
  });

  it('returns nothing for empty text', () => {
    expect(grammar.check('   ', entry('kr-sagwa'), 'KR')).toEqual([]);
  });

  it('skips a rule that throws and keeps going', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const book = parseRuleBook({
      grammar: [
        {
          id: 'always-match',
          language: 'KR',
          partsOfSpeech: ['*'],
          type: 'pattern',
          issueKind: 'PATTERN',
          pattern: '요$',
          explanation: 'Ends with 요.',
        },
      ],
    });
    const [valid] = book.grammar;
    if (valid.type !== 'pattern') throw new Error('expected a pattern rule');
    const broken = new GrammarCorrector({
      ...book,
      grammar: [{ ...valid, id: 'broken', pattern: '(' }, valid],
    });

    const corrections = broken.check('좋아요', null, 'KR');
    expect(corrections.map((c) => c.ruleId)).toEqual(['always-match']);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('parseRuleBook', () => {
  const rule = (overrides: Record<string, unknown>) => ({
    id: 'r1',
    language: 'KR',
    partsOfSpeech: ['*'],
    type: 'pattern',
    issueKind: 'PATTERN',
    pattern: 'x',
    explanation: 'x',
    ...overrides,
  });

  it('rejects an invalid regex', () => {
    expect(() => parseRuleBook({ grammar: [rule({ pattern: '[' })] })).toThrow(LoadError);
  });

  it('rejects duplicate ids', () => {
    expect(() => parseRuleBook({ grammar: [rule({}), rule({})] })).toThrow('Duplicate rule id "r1"');
  });

  it('rejects unknown rule types', () => {
    expect(() => parseRuleBook({ grammar: [rule({ type: 'magic' })] })).toThrow(
      'Rule "r1": unknown rule type "magic"'
    );
  });

  it('loads the bundled rules', () => {
    const book = defaultRuleBook();
    expect(book.intents.map((r) => r.intent)).toEqual(['CORRECTION_REQUEST', 'GREETING', 'QUESTION']);
    expect(book.conjugation.godanMasuStems['む']).toBe('み');
  });
});
