import type { DifficultyTier, Language } from '../types';
import { isTier } from '../types';
import { hasKana, hasKanji } from './linguistics';

/**
 * One usable line of a word list. Only `word` is required; a missing translation
 * can be filled in by the enricher before import.
 */
export interface WordListRow {
  line: number;
  word: string;
  translation: string;
  tier?: DifficultyTier;
  partOfSpeech?: string;
  extra?: string;
  romanization?: string;
}

export interface WordListParseResult {
  rows: WordListRow[];
  skippedLines: number[];
}

const HEADER_WORDS = new Set(['word', 'surface', 'surfaceform', 'term', '단어', '単語']);

const unquote = (value: string | undefined): string => (value ?? '').trim().replace(/^"|"$/g, '').trim();

// Tab first, then quote-aware comma, then the full-width comma
export const splitColumns = (line: string): string[] => {
  if (line.includes('\t')) return line.split('\t');
  if (line.includes(',')) return line.split(/,(?=(?:(?:[^"]*"){2})*[^"]*$)/);
  return line.split('，');
};

const isHeader = (columns: string[]): boolean => HEADER_WORDS.has(unquote(columns[0]).toLowerCase());

/**
 * Columns: word, translation, tier, part of speech, extra (hanja, kanji or kana reading).
 */
export const parseWordListLine = (line: string, lineNumber: number): WordListRow | null => {
  if (!line.trim() || line.trimStart().startsWith('#')) return null;
  const columns = splitColumns(line);
  const word = unquote(columns[0]);
  if (!word) return null;

  const tierValue = unquote(columns[2]).toUpperCase();
  const partOfSpeech = unquote(columns[3]).toLowerCase();
  const extra = unquote(columns[4]);

  return {
    line: lineNumber,
    word,
    translation: unquote(columns[1]),
    tier: isTier(tierValue) ? tierValue : undefined,
    partOfSpeech: partOfSpeech || undefined,
    extra: extra || undefined,
  };
};

export const parseWordList = (text: string): WordListParseResult => {
  const rows: WordListRow[] = [];
  const skippedLines: number[] = [];

  text.replace(/^\uFEFF/, '').split(/\r?\n/).forEach((line, i) => {
    if (i === 0 && isHeader(splitColumns(line))) return;
    const row = parseWordListLine(line, i + 1);
    if (row) rows.push(row);
    else if (line.trim() && !line.trimStart().startsWith('#')) skippedLines.push(i + 1);
  });

  return { rows, skippedLines };
};

/**
 * Incremental parser for large lists: feed byte chunks, rows come out in batches.
 */
export const createWordListStreamParser = (
  onBatch: (rows: WordListRow[]) => Promise<void>,
  batchSize = 500
) => {
  const decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: false });
  let leftover = '';
  let lineNumber = 0;
  let batch: WordListRow[] = [];
  let total = 0;
  const skippedLines: number[] = [];

  const flush = async () => {
    if (batch.length === 0) return;
    const rows = batch;
    batch = [];
    total += rows.length;
    await onBatch(rows);
  };

  const processLines = async (lines: string[]) => {
    for (const line of lines) {
      lineNumber++;
      if (lineNumber === 1 && isHeader(splitColumns(line))) continue;
      const row = parseWordListLine(line, lineNumber);
      if (row) batch.push(row);
      else if (line.trim() && !line.trimStart().startsWith('#')) skippedLines.push(lineNumber);
      if (batch.length >= batchSize) await flush();
    }
  };

  return {
    push: async (chunk: Uint8Array) => {
      const combined = leftover + decoder.decode(chunk, { stream: true });
      const lines = combined.split(/\r?\n/);
      leftover = lines.pop() ?? '';
      await processLines(lines);
    },
    end: async (): Promise<{ total: number; skippedLines: number[] }> => {
      const rest = leftover + decoder.decode();
      leftover = '';
      if (rest.trim()) await processLines([rest]);
      await flush();
      return { total, skippedLines };
    },
  };
};

/**
 * Shapes a row into a raw corpus record; the corpus loader does the validation.
 */
export const toRawEntry = (row: WordListRow, language: Language, idPrefix: string): Record<string, unknown> => {
  const metadata: Record<string, string> = {};
  if (row.extra) {
    if (language === 'KR' && hasKanji(row.extra)) metadata.hanja = row.extra;
    if (language === 'JP' && hasKanji(row.extra)) metadata.kanji = row.extra;
    else if (language === 'JP' && hasKana(row.extra)) metadata.reading = row.extra;
  }
  if (language === 'JP' && !metadata.reading && hasKana(row.word) && !hasKanji(row.word)) {
    metadata.reading = row.word;
  }

  return {
    id: `${idPrefix}-${row.line}`,
    language,
    surfaceForm: row.word,
    canonicalForm: row.word,
    translation: row.translation,
    partOfSpeech: row.partOfSpeech,
    romanization: row.romanization,
    difficultyTier: row.tier ?? 'BEGINNER',
    usageExamples: [],
    metadata,
  };
};
