import fs from 'node:fs';
import path from 'node:path';
import type { DifficultyTier, ExamType, ProficiencyLevel } from '../types';
import { TIERS, isTier } from '../types';
import { ValidationError } from './errors';

export type TierMix = Record<DifficultyTier, number>;

export interface TutorConfig {
  conversation: {
    recentIntentsLimit: number;
    contextIdleTimeoutMs: number;
  };
  matching: {
    weights: { overlap: number; tierProximity: number; continuity: number };
    variantQuality: number;
    minScore: number;
  };
  assessment: {
    defaultQuestionCount: number;
    choicesPerQuestion: number;
    secondsPerQuestion: number;
    passThreshold: Record<ExamType, number>;
  };
  rating: {
    // Minimum score for levels 1..6
    levelThresholds: [number, number, number, number, number, number];
    tierMixByLevel: Record<ProficiencyLevel, TierMix>;
    preferredTierByLevel: Record<ProficiencyLevel, DifficultyTier>;
    tierWeights: Record<DifficultyTier, number>;
    pointsPerCorrect: number;
    passBonus: number;
    conversationPointsPerTurn: number;
    conversationDailyCap: number;
  };
  gemini: {
    apiKey?: string;
    model: string;
  };
}

export const defaultConfig: TutorConfig = {
  conversation: {
    recentIntentsLimit: 5,
    contextIdleTimeoutMs: 30 * 60 * 1000,
  },
  matching: {
    weights: { overlap: 1, tierProximity: 0.3, continuity: 0.2 },
    variantQuality: 0.7,
    minScore: 0.5,
  },
  assessment: {
    defaultQuestionCount: 10,
    choicesPerQuestion: 4,
    secondsPerQuestion: 60,
    passThreshold: { TOPIK: 0.6, JLPT: 0.6 },
  },
  rating: {
    levelThresholds: [0, 30, 100, 250, 500, 900],
    tierMixByLevel: {
      1: { BEGINNER: 1, INTERMEDIATE: 0, ADVANCED: 0 },
      2: { BEGINNER: 0.7, INTERMEDIATE: 0.3, ADVANCED: 0 },
      3: { BEGINNER: 0.4, INTERMEDIATE: 0.5, ADVANCED: 0.1 },
      4: { BEGINNER: 0.2, INTERMEDIATE: 0.5, ADVANCED: 0.3 },
      5: { BEGINNER: 0.1, INTERMEDIATE: 0.3, ADVANCED: 0.6 },
      6: { BEGINNER: 0, INTERMEDIATE: 0.2, ADVANCED: 0.8 },
    },
    preferredTierByLevel: {
      1: 'BEGINNER',
      2: 'BEGINNER',
      3: 'INTERMEDIATE',
      4: 'INTERMEDIATE',
      5: 'ADVANCED',
      6: 'ADVANCED',
    },
    tierWeights: { BEGINNER: 1, INTERMEDIATE: 2, ADVANCED: 3 },
    pointsPerCorrect: 1,
    passBonus: 5,
    conversationPointsPerTurn: 1,
    conversationDailyCap: 20,
  },
  gemini: {
    model: 'gemini-2.5-flash',
  },
};

// Lists such as levelThresholds are replaced whole; tables merge key by key
type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? (T[K] extends readonly unknown[] ? T[K] : DeepPartial<T[K]>) : T[K];
};

export type TutorConfigOverrides = {
  [S in keyof TutorConfig]?: DeepPartial<TutorConfig[S]>;
};

const LEVELS: readonly ProficiencyLevel[] = [1, 2, 3, 4, 5, 6];
const EXAM_TYPES: readonly ExamType[] = ['TOPIK', 'JLPT'];

const SECTIONS: readonly string[] = ['conversation', 'matching', 'assessment', 'rating', 'gemini'];

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isConfigOverrides = (value: unknown): value is TutorConfigOverrides =>
  isPlainObject(value) &&
  Object.entries(value).every(
    ([key, section]) => SECTIONS.includes(key) && isPlainObject(section)
  );

const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const assertPositive = (label: string, value: unknown, allowZero = false) => {
  if (!isFiniteNumber(value) || value < 0 || (!allowZero && value === 0)) {
    throw new ValidationError(`Config "${label}" must be a ${allowZero ? 'non-negative' : 'positive'} number`);
  }
};

export const validateConfig = (config: TutorConfig): TutorConfig => {
  assertPositive('conversation.recentIntentsLimit', config.conversation.recentIntentsLimit);
  assertPositive('conversation.contextIdleTimeoutMs', config.conversation.contextIdleTimeoutMs);
  assertPositive('matching.minScore', config.matching.minScore, true);
  assertPositive('assessment.defaultQuestionCount', config.assessment.defaultQuestionCount);
  assertPositive('assessment.secondsPerQuestion', config.assessment.secondsPerQuestion);
  assertPositive('assessment.choicesPerQuestion', config.assessment.choicesPerQuestion);
  if (config.assessment.choicesPerQuestion < 2) {
    throw new ValidationError('Config "assessment.choicesPerQuestion" must be at least 2');
  }
  for (const exam of EXAM_TYPES) {
    const threshold = config.assessment.passThreshold[exam];
    if (!isFiniteNumber(threshold) || threshold <= 0 || threshold > 1) {
      throw new ValidationError(`Config pass threshold for ${exam} must be within (0, 1]`);
    }
  }

  const { weights, variantQuality } = config.matching;
  assertPositive('matching.weights.overlap', weights.overlap, true);
  assertPositive('matching.weights.tierProximity', weights.tierProximity, true);
  assertPositive('matching.weights.continuity', weights.continuity, true);
  if (!isFiniteNumber(variantQuality) || variantQuality <= 0 || variantQuality > 1) {
    throw new ValidationError('Config "matching.variantQuality" must be within (0, 1]');
  }

  const thresholds = config.rating.levelThresholds;
  if (thresholds.length !== 6 || thresholds[0] !== 0) {
    throw new ValidationError('Config "rating.levelThresholds" needs six values starting at 0');
  }
  for (let i = 1; i < thresholds.length; i++) {
    if (!isFiniteNumber(thresholds[i]) || thresholds[i] <= thresholds[i - 1]) {
      throw new ValidationError('Config "rating.levelThresholds" must be strictly increasing');
    }
  }
  for (const level of LEVELS) {
    const mix = config.rating.tierMixByLevel[level];
    TIERS.forEach((tier) => assertPositive(`rating.tierMixByLevel.${level}.${tier}`, mix[tier], true));
    if (TIERS.every((tier) => mix[tier] === 0)) {
      throw new ValidationError(`Config "rating.tierMixByLevel.${level}" needs at least one non-zero share`);
    }
    if (!isTier(config.rating.preferredTierByLevel[level])) {
      throw new ValidationError(`Config "rating.preferredTierByLevel.${level}" must be a difficulty tier`);
    }
  }
  TIERS.forEach((tier) => assertPositive(`rating.tierWeights.${tier}`, config.rating.tierWeights[tier], true));
  assertPositive('rating.pointsPerCorrect', config.rating.pointsPerCorrect, true);
  assertPositive('rating.passBonus', config.rating.passBonus, true);
  assertPositive('rating.conversationPointsPerTurn', config.rating.conversationPointsPerTurn, true);
  assertPositive('rating.conversationDailyCap', config.rating.conversationDailyCap, true);

  return config;
};

const mergeByLevel = <T extends object>(
  base: Record<ProficiencyLevel, T>,
  overrides: { [L in ProficiencyLevel]?: DeepPartial<T> | T } | undefined
): Record<ProficiencyLevel, T> => {
  const merged = { ...base };
  for (const level of LEVELS) {
    const override = overrides?.[level];
    if (override !== undefined) merged[level] = { ...base[level], ...override };
  }
  return merged;
};

/**
 * Merges overrides onto the defaults key by key, then validates the result.
 */
export const createConfig = (overrides: TutorConfigOverrides = {}): TutorConfig => {
  const base = structuredClone(defaultConfig);
  const { matching, assessment, rating } = overrides;

  return validateConfig({
    conversation: { ...base.conversation, ...overrides.conversation },
    matching: {
      ...base.matching,
      ...matching,
      weights: { ...base.matching.weights, ...matching?.weights },
    },
    assessment: {
      ...base.assessment,
      ...assessment,
      passThreshold: { ...base.assessment.passThreshold, ...assessment?.passThreshold },
    },
    rating: {
      ...base.rating,
      ...rating,
      levelThresholds: rating?.levelThresholds ?? base.rating.levelThresholds,
      tierMixByLevel: mergeByLevel(base.rating.tierMixByLevel, rating?.tierMixByLevel),
      preferredTierByLevel: { ...base.rating.preferredTierByLevel, ...rating?.preferredTierByLevel },
      tierWeights: { ...base.rating.tierWeights, ...rating?.tierWeights },
    },
    gemini: { ...base.gemini, ...overrides.gemini },
  });
};

/**
 * Reads the tutor configuration.
 * Defaults are merged with config/tutor.json (or the file named by TUTOR_CONFIG);
 * the Gemini key comes from GEMINI_API_KEY or API_KEY.
 */
export const loadTutorConfig = (
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): TutorConfig => {
  const resolved = path.resolve(configPath ?? env.TUTOR_CONFIG ?? 'config/tutor.json');
  let fileConfig: TutorConfigOverrides = {};

  if (fs.existsSync(resolved)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
      if (isConfigOverrides(parsed)) fileConfig = parsed;
      else console.warn(`[Config] ${resolved} has unknown sections, using defaults`);
    } catch (error) {
      throw new ValidationError(`Failed to read config file ${resolved}: ${String(error)}`);
    }
  }

  const config = createConfig(fileConfig);
  const apiKey = env.GEMINI_API_KEY ?? env.API_KEY;
  if (apiKey) config.gemini.apiKey = apiKey;

  console.info(`[Config] Loaded tutor config${fs.existsSync(resolved) ? ` from ${resolved}` : ' (defaults)'}`);
  return config;
};
