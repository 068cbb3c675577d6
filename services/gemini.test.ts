import { beforeEach, describe, expect, it, vi } from 'vitest';
import { GeminiEnricher, parseEnrichmentResponse } from './gemini';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
  Type: { ARRAY: 'ARRAY', OBJECT: 'OBJECT', STRING: 'STRING' },
}));

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  generateContent.mockReset();
});

describe('parseEnrichmentResponse', () => {
  it('keeps rows with a word and a translation', () => {
    const text = JSON.stringify([
      { word: ' 학교 ', translation: 'school', partOfSpeech: 'Noun', hanja: '學校', romanization: '' },
      { word: '책' },
      'noise',
    ]);
    expect(parseEnrichmentResponse(text)).toEqual([
      {
        word: '학교',
        translation: 'school',
        partOfSpeech: 'noun',
        romanization: undefined,
        hanja: '學校',
        reading: undefined,
      },
    ]);
  });

  it('returns nothing for a reply that is not a JSON list', () => {
    expect(parseEnrichmentResponse('{"word":"책"}')).toEqual([]);
    expect(parseEnrichmentResponse(undefined)).toEqual([]);
    expect(parseEnrichmentResponse('not json')).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});

describe('GeminiEnricher', () => {
  const settings = { apiKey: 'test-secret', model: 'test-model' };

  it('returns only the words it was asked about', async () => {
    generateContent.mockResolvedValue({
      text: JSON.stringify([
        { word: '水', translation: 'water', reading: 'みず' },
        { word: '火', translation: 'fire' },
      ]),
    });

    const result = await new GeminiEnricher(settings).enrich(['水'], 'JP');

    expect([...result.keys()]).toEqual(['水']);
    expect(result.get('水')).toMatchObject({ translation: 'water', reading: 'みず' });
    expect(generateContent).toHaveBeenCalledWith(expect.objectContaining({ model: 'test-model' }));
  });

  it('skips the request for an empty batch', async () => {
    expect((await new GeminiEnricher(settings).enrich([], 'KR')).size).toBe(0);
    expect(generateContent).not.toHaveBeenCalled();
  });

  it('logs a failed request and returns nothing', async () => {
    generateContent.mockRejectedValue(new Error('quota exceeded'));

    const result = await new GeminiEnricher(settings).enrich(['책'], 'KR');

    expect(result.size).toBe(0);
    expect(console.error).toHaveBeenCalledWith('[Gemini] Enrichment request failed', expect.any(Error));
  });
});
