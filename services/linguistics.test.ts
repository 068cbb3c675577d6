import { describe, expect, it } from 'vitest';
import {
  analyzeKoreanStructure,
  endsWithRieul,
  foldLongVowels,
  getLemmaCandidates,
  hasBatchim,
  normalizeText,
  romanizeHangul,
  romanizeKana,
  segmentByLongestMatch,
  toHiragana,
  tokenize,
} from './linguistics';

describe('normalizeText', () => {
  it('folds full-width characters, case and punctuation', () => {
    expect(normalizeText('ＡＢＣ！')).toBe('abc');
    expect(normalizeText('  안녕,   친구!  ')).toBe('안녕 친구');
  });
});

describe('tokenize', () => {
  it('keeps offsets into the original text', () => {
    expect(tokenize('안녕, 친구!')).toEqual([
      { text: '안녕', normalized: '안녕', start: 0, end: 2 },
      { text: '친구', normalized: '친구', start: 4, end: 6 },
    ]);
  });

  it('returns nothing for punctuation only', () => {
    expect(tokenize('?!')).toEqual([]);
  });
});

describe('batchim helpers', () => {
  it('detects a closing consonant', () => {
    expect(hasBatchim('책')).toBe(true);
    expect(hasBatchim('사과')).toBe(false);
    expect(hasBatchim('abc')).toBe(false);
  });

  it('detects a final ㄹ', () => {
    expect(endsWithRieul('물')).toBe(true);
    expect(endsWithRieul('책')).toBe(false);
  });
});

describe('romanizeHangul', () => {
  it('applies nasal assimilation', () => {
    expect(romanizeHangul('감사합니다')).toBe('gamsahamnida');
  });

  it('carries a final consonant over a silent initial', () => {
    expect(romanizeHangul('한국어')).toBe('hangugeo');
  });

  it('romanizes plain syllables', () => {
    expect(romanizeHangul('학생')).toBe('haksaeng');
  });
});

describe('romanizeKana', () => {
  it('doubles the consonant after a small tsu', () => {
    expect(romanizeKana('がっこう')).toBe('gakkou');
  });

  it('handles katakana digraphs and the long vowel mark', () => {
    expect(romanizeKana('チョコレート')).toBe('chokoreeto');
  });

  it('converts katakana to hiragana', () => {
    expect(toHiragana('リンゴ')).toBe('りんご');
  });

  it('folds long vowels the way learners type them', () => {
    expect(foldLongVowels('arigatou')).toBe('arigato');
    expect(foldLongVowels('arigatoo')).toBe('arigato');
  });
});

describe('getLemmaCandidates', () => {
  it('strips Korean particles and copulas', () => {
    expect(getLemmaCandidates('사과를', 'KR')).toContain('사과');
    expect(getLemmaCandidates('학생이에요', 'KR')).toContain('학생');
  });

  it('restores the dictionary form of polite Korean verbs', () => {
    expect(getLemmaCandidates('먹어요', 'KR')).toContain('먹다');
  });

  it('restores ichidan and godan dictionary forms', () => {
    expect(getLemmaCandidates('食べます', 'JP')).toContain('食べる');
    expect(getLemmaCandidates('飲みます', 'JP')).toContain('飲む');
  });

  it('always includes the word itself', () => {
    expect(getLemmaCandidates('책', 'KR')).toEqual(['책']);
  });
});

describe('analyzeKoreanStructure', () => {
  it('splits root and particle', () => {
    expect(analyzeKoreanStructure('사과를')).toEqual({ root: '사과', particle: '를', function: 'Object Marker' });
  });

  it('prefers the longer particle', () => {
    expect(analyzeKoreanStructure('학교에서')).toEqual({
      root: '학교',
      particle: '에서',
      function: 'Location (Action)',
    });
  });

  it('returns null without a particle', () => {
    expect(analyzeKoreanStructure('안녕')).toBeNull();
  });
});

describe('segmentByLongestMatch', () => {
  it('splits unspaced text on known keys', () => {
    const keys = new Set(['りんご', '食べる']);
    expect(segmentByLongestMatch('りんごを食べる', (c) => keys.has(c), 3)).toEqual(['りんご', 'を', '食べる']);
  });

  it('groups uncovered characters together', () => {
    expect(segmentByLongestMatch('あいう', () => false, 3)).toEqual(['あいう']);
  });
});
