import type { DifficultyTier, ProficiencyLevel, TierCounts } from '../types';
import { TIERS } from '../types';
import type { TierMix, TutorConfig } from './config';

type Thresholds = TutorConfig['rating']['levelThresholds'];

const LEVELS: readonly ProficiencyLevel[] = [1, 2, 3, 4, 5, 6];

export const emptyTierCounts = (): TierCounts => ({ BEGINNER: 0, INTERMEDIATE: 0, ADVANCED: 0 });

export const levelOf = (score: number, thresholds: Thresholds): ProficiencyLevel => {
    for (let i = LEVELS.length - 1; i > 0; i--) {
        if (score >= thresholds[i]) return LEVELS[i];
    }
    return 1;
};

export const levelProgress = (score: number, thresholds: Thresholds) => {
    const level = levelOf(score, thresholds);
    const floor = thresholds[level - 1];
    if (level === 6) {
        return { level, progress: 100, score, nextTarget: score };
    }
    const nextTarget = thresholds[level];
    const progress = Math.round(((score - floor) / (nextTarget - floor)) * 100);
    return { level, progress, score, nextTarget };
};

/**
 * Splits `total` questions across tiers by the level's mix.
 * Largest remainder: floor every share, then hand the leftovers to the biggest
 * fractional parts (ties go to the lower tier).
 */
export const allocateTierCounts = (total: number, mix: TierMix): TierCounts => {
    const weightSum = TIERS.reduce((acc, tier) => acc + mix[tier], 0);
    const counts = emptyTierCounts();
    if (total <= 0 || weightSum <= 0) return counts;

    const shares = TIERS.map((tier, i) => {
        const exact = (mix[tier] / weightSum) * total;
        counts[tier] = Math.floor(exact);
        return { tier, remainder: exact - Math.floor(exact), i };
    });

    let leftover = total - TIERS.reduce((acc, tier) => acc + counts[tier], 0);
    const byRemainder = shares
        .filter((s) => mix[s.tier] > 0)
        .sort((a, b) => b.remainder - a.remainder || a.i - b.i);
    for (let k = 0; leftover > 0 && byRemainder.length > 0; k++, leftover--) {
        counts[byRemainder[k % byRemainder.length].tier]++;
    }
    return counts;
};

/**
 * Points for a finished test: weighted correct answers plus the pass bonus.
 * A failed test earns nothing, so the score never drops.
 */
export const testScoreDelta = (
    correctByTier: TierCounts,
    passed: boolean,
    rating: TutorConfig['rating']
): number => {
    if (!passed) return 0;
    const weighted = TIERS.reduce(
        (acc, tier: DifficultyTier) => acc + correctByTier[tier] * rating.tierWeights[tier] * rating.pointsPerCorrect,
        0
    );
    return Math.max(0, weighted + rating.passBonus);
};

export const utcDay = (timestamp: number): string => new Date(timestamp).toISOString().split('T')[0];

/**
 * Conversation points still available today under the daily cap.
 */
export const conversationAward = (
    daily: { day: string; points: number },
    timestamp: number,
    rating: TutorConfig['rating']
): { award: number; daily: { day: string; points: number } } => {
    const day = utcDay(timestamp);
    const earned = daily.day === day ? daily.points : 0;
    const award = Math.max(0, Math.min(rating.conversationPointsPerTurn, rating.conversationDailyCap - earned));
    return { award, daily: { day, points: earned + award } };
};
