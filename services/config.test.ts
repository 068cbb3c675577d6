import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createConfig, defaultConfig, loadTutorConfig } from './config';
import { ValidationError } from './errors';

let dir: string;

const writeConfig = (contents: string): string => {
  const file = path.join(dir, 'tutor.json');
  fs.writeFileSync(file, contents, 'utf-8');
  return file;
};

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tutor-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('createConfig', () => {
  it('returns a copy of the defaults', () => {
    const config = createConfig();
    expect(config).toEqual(defaultConfig);

    config.rating.tierWeights.ADVANCED = 10;
    expect(defaultConfig.rating.tierWeights.ADVANCED).toBe(3);
  });

  it('merges overrides per section', () => {
    const config = createConfig({ assessment: { secondsPerQuestion: 30 } });
    expect(config.assessment).toMatchObject({ secondsPerQuestion: 30, choicesPerQuestion: 4, defaultQuestionCount: 10 });
  });

  it('merges nested tables key by key', () => {
    const config = createConfig({ rating: { tierMixByLevel: { 2: { ADVANCED: 0.1 } }, tierWeights: { ADVANCED: 4 } } });
    expect(config.rating.tierMixByLevel[2]).toEqual({ BEGINNER: 0.7, INTERMEDIATE: 0.3, ADVANCED: 0.1 });
    expect(config.rating.tierMixByLevel[1]).toEqual({ BEGINNER: 1, INTERMEDIATE: 0, ADVANCED: 0 });
    expect(config.rating.tierWeights).toEqual({ BEGINNER: 1, INTERMEDIATE: 2, ADVANCED: 4 });
  });

  it('rejects a level whose tier mix is all zero', () => {
    expect(() => createConfig({ rating: { tierMixByLevel: { 1: { BEGINNER: 0 } } } })).toThrow(
      'Config "rating.tierMixByLevel.1" needs at least one non-zero share'
    );
  });

  it('rejects thresholds that do not increase', () => {
    expect(() => createConfig({ rating: { levelThresholds: [0, 30, 30, 250, 500, 900] } })).toThrow(
      'Config "rating.levelThresholds" must be strictly increasing'
    );
  });

  it('rejects a pass threshold above one', () => {
    expect(() => createConfig({ assessment: { passThreshold: { TOPIK: 1.5, JLPT: 0.6 } } })).toThrow(
      'Config pass threshold for TOPIK must be within (0, 1]'
    );
  });

  it('rejects a single choice per question', () => {
    expect(() => createConfig({ assessment: { choicesPerQuestion: 1 } })).toThrow(ValidationError);
  });
});

describe('loadTutorConfig', () => {
  it('reads the file and the key from the environment', () => {
    const file = writeConfig('{"assessment": {"secondsPerQuestion": 45}}');
    const config = loadTutorConfig(file, { GEMINI_API_KEY: 'test-secret' });

    expect(config.assessment.secondsPerQuestion).toBe(45);
    expect(config.gemini).toEqual({ model: 'gemini-2.5-flash', apiKey: 'test-secret' });
  });

  it('keeps defaults for table keys the file leaves out', () => {
    const file = writeConfig('{"assessment": {"passThreshold": {"TOPIK": 0.7}}, "matching": {"weights": {"overlap": 2}}}');
    const config = loadTutorConfig(file, {});

    expect(config.assessment.passThreshold).toEqual({ TOPIK: 0.7, JLPT: 0.6 });
    expect(config.matching.weights).toEqual({ overlap: 2, tierProximity: 0.3, continuity: 0.2 });
  });

  it('rejects table values of the wrong kind', () => {
    const weight = writeConfig('{"matching": {"weights": {"overlap": "high"}}}');
    expect(() => loadTutorConfig(weight, {})).toThrow('Config "matching.weights.overlap" must be a non-negative number');

    const threshold = writeConfig('{"assessment": {"passThreshold": {"JLPT": null}}}');
    expect(() => loadTutorConfig(threshold, {})).toThrow('Config pass threshold for JLPT must be within (0, 1]');

    const tier = writeConfig('{"rating": {"preferredTierByLevel": {"3": "EXPERT"}}}');
    expect(() => loadTutorConfig(tier, {})).toThrow('Config "rating.preferredTierByLevel.3" must be a difficulty tier');
  });

  it('falls back to defaults without a file', () => {
    const config = loadTutorConfig(path.join(dir, 'absent.json'), {});
    expect(config).toEqual(defaultConfig);
  });

  it('ignores a file with unknown sections', () => {
    const file = writeConfig('{"theme": {"dark": true}}');
    expect(loadTutorConfig(file, {})).toEqual(defaultConfig);
    expect(console.warn).toHaveBeenCalledWith(`[Config] ${file} has unknown sections, using defaults`);
  });

  it('fails on a file that is not JSON', () => {
    const file = writeConfig('{ nope');
    expect(() => loadTutorConfig(file, {})).toThrow(ValidationError);
  });

  it('accepts the bundled example', () => {
    const example = fileURLToPath(new URL('../config/tutor.example.json', import.meta.url));
    const config = loadTutorConfig(example, {});

    expect(config.assessment.passThreshold).toEqual({ TOPIK: 0.6, JLPT: 0.65 });
    expect(config.rating.conversationDailyCap).toBe(15);
  });
});
