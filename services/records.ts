import type {
  ConversationContext,
  ProficiencyLevel,
  ProficiencyRecord,
  ScoreReport,
  TestInstance,
  TestQuestion,
  TestSummary,
  TierCounts,
} from '../types';
import { isExamType, isIntent, isLanguage, isTier, TIERS } from '../types';

// Guards for records read back from storage. Anything that fails is treated as absent.

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isCount = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

const isTimestamp = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const isNullable = <T>(value: unknown, guard: (v: unknown) => v is T): value is T | null =>
  value === null || guard(value);

const isString = (value: unknown): value is string => typeof value === 'string';

const isStringList = (value: unknown): value is string[] => Array.isArray(value) && value.every(isString);

export const isProficiencyLevel = (value: unknown): value is ProficiencyLevel =>
  value === 1 || value === 2 || value === 3 || value === 4 || value === 5 || value === 6;

const isTierCounts = (value: unknown): value is TierCounts =>
  isRecord(value) && TIERS.every((tier) => isCount(value[tier]));

export const isConversationContext = (value: unknown): value is ConversationContext =>
  isRecord(value) &&
  isString(value.userId) &&
  isLanguage(value.language) &&
  isNullable(value.lastMatchedEntryId, isString) &&
  isCount(value.turnCount) &&
  Array.isArray(value.recentIntents) &&
  value.recentIntents.every(isIntent) &&
  isNullable(value.lastClarificationIndex, isCount) &&
  isTimestamp(value.updatedAt);

const isTestQuestion = (value: unknown): value is TestQuestion =>
  isRecord(value) &&
  isString(value.entryId) &&
  isTier(value.tier) &&
  (value.promptVariant === 'MEANING' || value.promptVariant === 'REVERSE' || value.promptVariant === 'CLOZE') &&
  isString(value.prompt) &&
  isStringList(value.choices) &&
  isCount(value.correctAnswerIndex) &&
  value.correctAnswerIndex < value.choices.length;

const isScoreReport = (value: unknown): value is ScoreReport =>
  isRecord(value) &&
  isString(value.testId) &&
  isCount(value.correctCount) &&
  isCount(value.total) &&
  typeof value.passed === 'boolean' &&
  isCount(value.scoreDelta) &&
  typeof value.derivedLevelDelta === 'number' &&
  isTierCounts(value.correctByTier) &&
  isTierCounts(value.totalByTier);

export const isTestInstance = (value: unknown): value is TestInstance =>
  isRecord(value) &&
  isString(value.testId) &&
  isString(value.userId) &&
  isExamType(value.examType) &&
  isLanguage(value.language) &&
  (value.status === 'CREATED' ||
    value.status === 'IN_PROGRESS' ||
    value.status === 'COMPLETED' ||
    value.status === 'EXPIRED') &&
  Array.isArray(value.questions) &&
  value.questions.every(isTestQuestion) &&
  Array.isArray(value.answers) &&
  value.answers.length === value.questions.length &&
  value.answers.every((a) => isNullable(a, isCount)) &&
  isTimestamp(value.createdAt) &&
  isNullable(value.startedAt, isTimestamp) &&
  isNullable(value.expiresAt, isTimestamp) &&
  isNullable(value.report, isScoreReport);

const isTestSummary = (value: unknown): value is TestSummary =>
  isRecord(value) &&
  isString(value.testId) &&
  isExamType(value.examType) &&
  isCount(value.correctCount) &&
  isCount(value.total) &&
  typeof value.passed === 'boolean' &&
  isCount(value.scoreDelta) &&
  isTimestamp(value.completedAt);

export const isProficiencyRecord = (value: unknown): value is ProficiencyRecord =>
  isRecord(value) &&
  isString(value.userId) &&
  isCount(value.score) &&
  isProficiencyLevel(value.level) &&
  Array.isArray(value.testHistory) &&
  value.testHistory.every(isTestSummary) &&
  isCount(value.conversationActivityCount) &&
  isCount(value.wordsLearned) &&
  isStringList(value.encounteredEntryIds) &&
  isRecord(value.dailyConversation) &&
  isString(value.dailyConversation.day) &&
  isCount(value.dailyConversation.points) &&
  isTimestamp(value.scoreReachedAt) &&
  isCount(value.scoreSeq) &&
  isTimestamp(value.createdAt);

/**
 * Validates a stored value, logging and dropping it when it is malformed.
 */
export const readRecord = <T>(
  value: unknown,
  guard: (v: unknown) => v is T,
  label: string
): T | null => {
  if (value === undefined || value === null) return null;
  if (guard(value)) return value;
  console.warn(`[Storage] Ignoring malformed ${label} record`);
  return null;
};
