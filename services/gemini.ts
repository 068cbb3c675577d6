import { GoogleGenAI, Type } from '@google/genai';
import type { Language } from '../types';
import type { TutorConfig } from './config';

export interface Enrichment {
  word: string;
  translation: string;
  partOfSpeech?: string;
  romanization?: string;
  hanja?: string;
  reading?: string;
}

/**
 * Fills in what a word list left out. Implementations must not throw for a bad
 * response; missing words are simply absent from the result.
 */
export interface EntryEnricher {
  enrich(words: string[], language: Language): Promise<Map<string, Enrichment>>;
}

const LANGUAGE_NAMES: Record<Language, string> = { KR: 'Korean', JP: 'Japanese' };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optional = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() ? value.trim() : undefined;

/**
 * Reads the model's JSON reply. Rows without a word or a translation are dropped.
 */
export const parseEnrichmentResponse = (text: string | undefined): Enrichment[] => {
  let data: unknown;
  try {
    data = JSON.parse(text || '[]');
  } catch (e) {
    console.error('[Gemini] Enrichment reply was not JSON', e);
    return [];
  }
  if (!Array.isArray(data)) return [];

  const rows: Enrichment[] = [];
  for (const item of data) {
    if (!isRecord(item)) continue;
    const word = optional(item.word);
    const translation = optional(item.translation);
    if (!word || !translation) continue;
    rows.push({
      word,
      translation,
      partOfSpeech: optional(item.partOfSpeech)?.toLowerCase(),
      romanization: optional(item.romanization),
      hanja: optional(item.hanja),
      reading: optional(item.reading),
    });
  }
  return rows;
};

/**
 * Asks Gemini for English glosses of a batch of words.
 */
export class GeminiEnricher implements EntryEnricher {
  private readonly ai: GoogleGenAI;

  constructor(private readonly settings: TutorConfig['gemini']) {
    this.ai = new GoogleGenAI({ apiKey: settings.apiKey });
  }

  async enrich(words: string[], language: Language): Promise<Map<string, Enrichment>> {
    const result = new Map<string, Enrichment>();
    if (words.length === 0) return result;

    const prompt = `
    For each ${LANGUAGE_NAMES[language]} word below, give a short English translation,
    its part of speech (noun, verb, adjective, adverb, phrase) and a romanization.
    ${language === 'KR' ? 'Add the Hanja for Sino-Korean words if applicable.' : 'Add the kana reading for words written with kanji.'}
    Return a JSON array with one object per word, keeping the word exactly as given.

    Words:
    ${words.map((w) => `- ${w}`).join('\n    ')}
  `;

    try {
      const response = await this.ai.models.generateContent({
        model: this.settings.model,
        contents: prompt,
        config: {
          responseMimeType: 'application/json',
          responseSchema: {
            type: Type.ARRAY,
            items: {
              type: Type.OBJECT,
              properties: {
                word: { type: Type.STRING },
                translation: { type: Type.STRING },
                partOfSpeech: { type: Type.STRING, nullable: true },
                romanization: { type: Type.STRING, nullable: true },
                hanja: { type: Type.STRING, nullable: true },
                reading: { type: Type.STRING, nullable: true },
              },
              required: ['word', 'translation'],
            },
          },
        },
      });

      const wanted = new Set(words);
      for (const row of parseEnrichmentResponse(response.text)) {
        if (wanted.has(row.word)) result.set(row.word, row);
      }
    } catch (e) {
      console.error('[Gemini] Enrichment request failed', e);
    }
    return result;
  }
}
