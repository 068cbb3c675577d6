import fs from 'node:fs';
import path from 'node:path';
import type { Language } from '../types';
import { parseEntry } from './corpus';
import { LoadError } from './errors';
import { createWordListStreamParser, toRawEntry } from './fileParser';
import type { WordListRow } from './fileParser';
import type { EntryEnricher } from './gemini';

export interface CorpusSink {
  importCorpus(entries: unknown[], replace?: boolean): Promise<number>;
}

export interface WordListImportOptions {
  language: Language;
  idPrefix?: string;
  enricher?: EntryEnricher;
  replace?: boolean;
  onProgress?: (status: string, count: number) => void;
}

export interface WordListImportResult {
  imported: number;
  enriched: number;
  skippedLines: number[];
}

const applyEnrichment = async (
  rows: WordListRow[],
  language: Language,
  enricher: EntryEnricher | undefined
): Promise<{ rows: WordListRow[]; enriched: number }> => {
  const missing = rows.filter((r) => !r.translation).map((r) => r.word);
  if (!enricher || missing.length === 0) return { rows, enriched: 0 };

  const found = await enricher.enrich([...new Set(missing)], language);
  let enriched = 0;
  const filled = rows.map((row) => {
    const extra = found.get(row.word);
    if (row.translation || !extra) return row;
    enriched++;
    return {
      ...row,
      translation: extra.translation,
      partOfSpeech: row.partOfSpeech ?? extra.partOfSpeech,
      romanization: row.romanization ?? extra.romanization,
      extra: row.extra ?? (language === 'KR' ? extra.hanja : extra.reading),
    };
  });
  return { rows: filled, enriched };
};

/**
 * Streams a TSV/CSV word list into the corpus store. Lines without a translation are
 * sent to the enricher; whatever still fails validation is skipped and reported.
 * Call `TutorService.reloadCorpus` afterwards to make the new entries live.
 */
export const importWordList = async (
  filePath: string,
  sink: CorpusSink,
  options: WordListImportOptions
): Promise<WordListImportResult> => {
  const { language, enricher, onProgress } = options;
  const idPrefix = options.idPrefix ?? `${language.toLowerCase()}-${path.basename(filePath, path.extname(filePath))}`;
  let clearFirst = options.replace ?? false;
  let imported = 0;
  let enrichedTotal = 0;
  const invalidLines: number[] = [];

  try {
    onProgress?.('Reading word list...', 0);
    const parser = createWordListStreamParser(async (batch) => {
      const { rows, enriched } = await applyEnrichment(batch, language, enricher);
      enrichedTotal += enriched;

      const entries: unknown[] = [];
      for (const row of rows) {
        const raw = toRawEntry(row, language, idPrefix);
        try {
          parseEntry(raw, row.line);
          entries.push(raw);
        } catch (e) {
          if (!(e instanceof LoadError)) throw e;
          console.warn(`[Sync] Skipping line ${row.line}: ${e.message}`);
          invalidLines.push(row.line);
        }
      }

      if (entries.length > 0 || clearFirst) {
        imported += await sink.importCorpus(entries, clearFirst);
        clearFirst = false;
      }
      onProgress?.('Importing...', imported);
    });

    for await (const chunk of fs.createReadStream(filePath)) {
      if (chunk instanceof Uint8Array) await parser.push(chunk);
    }
    const { skippedLines } = await parser.end();

    const skipped = [...skippedLines, ...invalidLines].sort((a, b) => a - b);
    onProgress?.(`Done! ${imported.toLocaleString()} entries added.`, imported);
    console.info(`[Sync] Imported ${imported} entries from ${filePath} (${enrichedTotal} enriched, ${skipped.length} skipped)`);
    return { imported, enriched: enrichedTotal, skippedLines: skipped };
  } catch (e) {
    throw new LoadError(`Word list import failed: ${e instanceof Error ? e.message : String(e)}`);
  }
};
