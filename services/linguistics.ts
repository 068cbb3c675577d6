
import romanization from '../data/romanization.json';
import type { Language } from '../types';

const HANGUL_BASE = 0xac00;
const HANGUL_LAST = 0xd7a3;
const SILENT_INITIAL = 11; // ㅇ
const RIEUL_FINAL = 8; // ㄹ
const NASAL_INITIALS = new Set([2, 6]); // ㄴ, ㅁ

const INITIALS: string[] = romanization.hangul.initials;
const MEDIALS: string[] = romanization.hangul.medials;
const FINALS: string[] = romanization.hangul.finals;
const LIAISON: string[] = romanization.hangul.liaison;
const NASALIZED: Record<string, string> = romanization.hangul.nasalized;
const KANA_DIGRAPHS: Record<string, string> = romanization.kana.digraphs;
const KANA_MONOGRAPHS: Record<string, string> = romanization.kana.monographs;

const PUNCTUATION = /[.,!?;:()"'«»。、！？「」『』（）〜~…·]/g;
const TOKEN_PATTERN = /[^\s.,!?;:()"'«»。、！？「」『』（）〜~…·]+/gu;

export interface Token {
  text: string;
  normalized: string;
  start: number;
  end: number;
}

export const normalizeText = (text: string): string =>
  text.normalize('NFKC').toLowerCase().replace(PUNCTUATION, ' ').replace(/\s+/g, ' ').trim();

/**
 * Index key form: normalized with all whitespace removed.
 */
export const normalizeToken = (text: string): string => normalizeText(text).replace(/\s+/g, '');

export const tokenize = (text: string): Token[] => {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    const normalized = normalizeToken(match[0]);
    if (!normalized) continue;
    tokens.push({ text: match[0], normalized, start, end: start + match[0].length });
  }
  return tokens;
};

export const hasHangul = (text: string): boolean => /[가-힣]/.test(text);
export const hasKana = (text: string): boolean => /[぀-ヿ]/.test(text);
export const hasKanji = (text: string): boolean => /[一-鿿]/.test(text);
export const isLatin = (text: string): boolean => /^[a-z0-9'\- ]+$/i.test(text);

interface HangulParts {
  initial: number;
  medial: number;
  final: number;
}

const hangulParts = (syllable: string | undefined): HangulParts | null => {
  if (!syllable) return null;
  const code = syllable.charCodeAt(0);
  if (code < HANGUL_BASE || code > HANGUL_LAST) return null;
  const offset = code - HANGUL_BASE;
  return {
    initial: Math.floor(offset / 588),
    medial: Math.floor((offset % 588) / 28),
    final: offset % 28,
  };
};

/**
 * True when the last syllable of `word` closes on a consonant (받침).
 */
export const hasBatchim = (word: string): boolean => {
  const parts = hangulParts(word.slice(-1));
  return parts !== null && parts.final !== 0;
};

export const endsWithRieul = (word: string): boolean => hangulParts(word.slice(-1))?.final === RIEUL_FINAL;

/**
 * Revised Romanization with liaison and nasal assimilation (합니다 -> hamnida).
 */
export const romanizeHangul = (text: string): string => {
  const chars = [...text];
  let out = '';

  for (let i = 0; i < chars.length; i++) {
    const parts = hangulParts(chars[i]);
    if (!parts) {
      out += chars[i];
      continue;
    }

    out += INITIALS[parts.initial] + MEDIALS[parts.medial];
    if (parts.final === 0) continue;

    const next = hangulParts(chars[i + 1]);
    if (next && next.initial === SILENT_INITIAL) {
      out += LIAISON[parts.final];
    } else if (next && NASAL_INITIALS.has(next.initial)) {
      const plain = FINALS[parts.final];
      out += NASALIZED[plain] ?? plain;
    } else {
      out += FINALS[parts.final];
    }
  }

  return out;
};

export const toHiragana = (text: string): string =>
  text.replace(/[ァ-ヶ]/g, (c) => String.fromCharCode(c.charCodeAt(0) - 0x60));

/**
 * Hepburn romanization of hiragana/katakana. Kanji pass through untouched.
 */
export const romanizeKana = (text: string): string => {
  const chars = [...toHiragana(text)];
  let out = '';
  let geminate = false;

  for (let i = 0; i < chars.length; i++) {
    const c = chars[i];
    if (c === 'っ') {
      geminate = true;
      continue;
    }
    if (c === 'ー') {
      const last = out.slice(-1);
      if (last && 'aeiou'.includes(last)) out += last;
      continue;
    }

    let romaji = KANA_DIGRAPHS[c + (chars[i + 1] ?? '')];
    if (romaji) {
      i++;
    } else {
      romaji = KANA_MONOGRAPHS[c] ?? c;
    }

    if (geminate) {
      romaji = (romaji.startsWith('ch') ? 't' : romaji[0]) + romaji;
      geminate = false;
    }
    out += romaji;
  }

  return out;
};

/**
 * Learners rarely type long vowels: arigatou, arigato and arigatoo all fold to arigato.
 */
export const foldLongVowels = (romaji: string): string =>
  romaji.replace(/ou/g, 'o').replace(/([aeiou])\1/g, '$1');

export const romanize = (text: string, language: Language): string =>
  language === 'KR' ? romanizeHangul(text) : romanizeKana(text);

const KANA_I_TO_U: Record<string, string> = {
  'い': 'う', 'き': 'く', 'ぎ': 'ぐ', 'し': 'す', 'ち': 'つ',
  'に': 'ぬ', 'び': 'ぶ', 'み': 'む', 'り': 'る',
};

/**
 * Generates potential base forms (lemmas) for a given word based on language rules.
 */
export const getLemmaCandidates = (word: string, language: Language): string[] => {
    const w = word.toLowerCase().trim().replace(PUNCTUATION, '');
    const candidates = new Set<string>();

    candidates.add(w);

    if (language === 'KR') {
        const particles = [
            '은', '는', '이', '가',
            '을', '를',
            '에', '에서', '에게', '한테', '께',
            '로', '으로',
            '의',
            '와', '과', '하고', '이랑', '랑',
            '도', '만', '까지', '조차', '부터'
        ];
        particles.forEach(p => {
            if (w.endsWith(p) && w.length > p.length) {
                candidates.add(w.slice(0, -p.length));
            }
        });
        // Copula: 학생이에요 / 의사예요 / 학생입니다
        ['이에요', '예요', '입니다', '이다', '이야'].forEach(c => {
            if (w.endsWith(c) && w.length > c.length) {
                candidates.add(w.slice(0, -c.length));
            }
        });
        if (w.endsWith('해요')) candidates.add(w.slice(0, -2) + '하다');
        if (w.endsWith('했어요')) candidates.add(w.slice(0, -3) + '하다');
        if (w.endsWith('어요') || w.endsWith('아요')) candidates.add(w.slice(0, -2) + '다');
        if (w.endsWith('요')) candidates.add(w.slice(0, -1));
        if (w.endsWith('습니다')) candidates.add(w.slice(0, -3) + '다');
        if (w.endsWith('니까')) candidates.add(w.slice(0, -2) + '다');
        if (w.endsWith('고')) candidates.add(w.slice(0, -1) + '다');
    }
    else if (language === 'JP') {
        const particles = ['は', 'が', 'を', 'に', 'で', 'へ', 'と', 'も', 'の', 'から', 'まで'];
        particles.forEach(p => {
            if (w.endsWith(p) && w.length > p.length) {
                candidates.add(w.slice(0, -p.length));
            }
        });
        ['です', 'でした', 'だ'].forEach(c => {
            if (w.endsWith(c) && w.length > c.length) {
                candidates.add(w.slice(0, -c.length));
            }
        });

        const politeEndings = ['ました', 'ません', 'ましょう', 'ます'];
        const ending = politeEndings.find(e => w.endsWith(e) && w.length > e.length);
        if (ending) {
            const stem = w.slice(0, -ending.length);
            if (stem === 'し') candidates.add('する');
            if (stem === 'き') candidates.add('くる');
            candidates.add(stem + 'る');
            const last = stem.slice(-1);
            if (KANA_I_TO_U[last]) candidates.add(stem.slice(0, -1) + KANA_I_TO_U[last]);
        }
        if (w.endsWith('たい') && w.length > 2) candidates.add(w.slice(0, -2) + 'る');
    }

    return Array.from(candidates);
};

export interface KoreanStructure {
    root: string;
    particle: string;
    function: string; // e.g. "Subject Marker"
}

const particleMap: Record<string, string> = {
    '은': 'Topic Marker', '는': 'Topic Marker',
    '이': 'Subject Marker', '가': 'Subject Marker',
    '을': 'Object Marker', '를': 'Object Marker',
    '에': 'Time/Location', '에서': 'Location (Action)',
    '에게': 'Dative (To)', '한테': 'Dative (To)',
    '로': 'Instrument/Direction', '으로': 'Instrument/Direction',
    '의': 'Possessive',
    '와': 'Connective (And)', '과': 'Connective (And)',
    '하고': 'Connective (And)', '랑': 'Connective (And)', '이랑': 'Connective (And)',
    '도': 'Additive (Also)', '만': 'Limiter (Only)'
};

// Longest particle first (에서 before 서)
const sortedParticles = Object.keys(particleMap).sort((a, b) => b.length - a.length);

export const particleFunction = (particle: string): string | undefined => particleMap[particle];

/**
 * Separates a Korean word into root noun and particle.
 * 사과를 -> 사과 (Root) + 를 (Object Marker)
 */
export const analyzeKoreanStructure = (word: string): KoreanStructure | null => {
    const w = word.trim();

    for (const p of sortedParticles) {
        if (w.endsWith(p) && w.length > p.length) {
            return {
                root: w.slice(0, -p.length),
                particle: p,
                function: particleMap[p]
            };
        }
    }

    return null;
};

/**
 * Greedy longest-match segmentation for unspaced Japanese text.
 * Characters no key covers are grouped into their own segment.
 */
export const segmentByLongestMatch = (
    chunk: string,
    hasKey: (candidate: string) => boolean,
    maxKeyLength: number
): string[] => {
    const chars = [...chunk];
    const segments: string[] = [];
    let unknown = '';
    let i = 0;

    while (i < chars.length) {
        let matched = '';
        for (let len = Math.min(maxKeyLength, chars.length - i); len > 0; len--) {
            const candidate = chars.slice(i, i + len).join('');
            if (hasKey(candidate)) {
                matched = candidate;
                break;
            }
        }

        if (matched) {
            if (unknown) segments.push(unknown);
            unknown = '';
            segments.push(matched);
            i += [...matched].length;
        } else {
            unknown += chars[i];
            i++;
        }
    }

    if (unknown) segments.push(unknown);
    return segments;
};
