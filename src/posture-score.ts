// Seat Posture Server - Daily posture score
//
// total = clamp(0, 100, good - penalty + stability)
//   good      = min(60, floor(0.6 * % of time in normal posture))
//   penalty   = min(40, floor(sum over bad postures of % * severity * 0.15))
//   stability = mean-session-length band + session-count band

import { NORMAL_POSTURE, postureName } from "./posture-labels.js";
import { round2 } from "./posture-sessions.js";
import type { DailyScore, PostureSession } from "./types.js";

export interface DurationBand {
  /** inclusive, minutes */
  min: number;
  /** inclusive, minutes */
  max: number;
  points: number;
}

export interface CountBand {
  minSessions: number;
  points: number;
}

export interface GradeBand {
  minScore: number;
  grade: string;
  message: string;
}

export interface ScoringPolicy {
  goodPostureLabel: number;
  goodPostureFactor: number;
  goodPostureCap: number;
  penaltyFactor: number;
  penaltyCap: number;
  /** Severity per bad posture label; labels missing here weigh 1 */
  severityWeights: Readonly<Record<number, number>>;
  /** First band containing the mean session length wins */
  durationBands: readonly DurationBand[];
  durationFallbackPoints: number;
  /** Highest matching band wins; none matching scores 0 */
  countBands: readonly CountBand[];
  /** Ordered from best to worst */
  gradeBands: readonly GradeBand[];
  failingGrade: GradeBand;
  noDataGrade: string;
  noDataFeedback: string;
}

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  goodPostureLabel: NORMAL_POSTURE,
  goodPostureFactor: 0.6,
  goodPostureCap: 60,
  penaltyFactor: 0.15,
  penaltyCap: 40,
  severityWeights: { 1: 4, 2: 3, 3: 3, 4: 2, 5: 2, 6: 1, 7: 1 },
  durationBands: [
    { min: 5, max: 15, points: 10 },
    { min: 3, max: 20, points: 8 },
    { min: 1, max: 30, points: 5 },
  ],
  durationFallbackPoints: 2,
  countBands: [
    { minSessions: 3, points: 10 },
    { minSessions: 2, points: 7 },
    { minSessions: 1, points: 5 },
  ],
  gradeBands: [
    { minScore: 90, grade: "A+", message: "Excellent posture all day." },
    { minScore: 80, grade: "A", message: "Great posture. A little more attention and it is perfect." },
    { minScore: 70, grade: "B+", message: "Good posture. Try to hold the upright position a little longer." },
    { minScore: 60, grade: "B", message: "Average posture. Correct your posture consciously." },
    { minScore: 50, grade: "C+", message: "Your posture needs improvement." },
    { minScore: 40, grade: "C", message: "Your posture needs attention." },
  ],
  failingGrade: { minScore: 0, grade: "D", message: "Your posture was poor. Keep an upright posture consciously." },
  noDataGrade: "F",
  noDataFeedback: "No posture data was recorded.",
};

/** floor() that ignores binary rounding noise such as 0.6 * 80 = 47.99999... */
function floorPoints(value: number): number {
  return Math.floor(value + 1e-9);
}

export function stabilityPoints(meanSessionMinutes: number, sessionCount: number, policy = DEFAULT_SCORING_POLICY): number {
  const band = policy.durationBands.find((b) => meanSessionMinutes >= b.min && meanSessionMinutes <= b.max);
  const durationPoints = band ? band.points : policy.durationFallbackPoints;
  const countBand = policy.countBands.find((b) => sessionCount >= b.minSessions);
  return durationPoints + (countBand ? countBand.points : 0);
}

export function gradeFor(totalScore: number, policy = DEFAULT_SCORING_POLICY): GradeBand {
  return policy.gradeBands.find((b) => totalScore >= b.minScore) ?? policy.failingGrade;
}

/** Score one day's sessions. `sessions` must already be restricted to `date`. */
export function scoreDay(
  date: string,
  sessions: readonly PostureSession[],
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
): DailyScore {
  const totalTime = sessions.reduce((sum, s) => sum + s.durationMinutes, 0);
  if (sessions.length === 0 || totalTime <= 0) {
    return {
      date,
      totalScore: 0,
      goodPostureScore: 0,
      badPosturePenalty: 0,
      sessionStabilityScore: 0,
      monitoringTimeMinutes: 0,
      goodPosturePercentage: 0,
      worstPosture: "None",
      worstPostureDuration: 0,
      grade: policy.noDataGrade,
      feedback: policy.noDataFeedback,
    };
  }

  const perLabel = new Map<number, number>();
  for (const s of sessions) {
    perLabel.set(s.postureId, (perLabel.get(s.postureId) ?? 0) + s.durationMinutes);
  }

  const goodPercentage = ((perLabel.get(policy.goodPostureLabel) ?? 0) / totalTime) * 100;
  const goodPostureScore = Math.min(policy.goodPostureCap, floorPoints(goodPercentage * policy.goodPostureFactor));

  let rawPenalty = 0;
  let worstLabel: number | null = null;
  let worstDuration = 0;
  for (const [label, minutes] of [...perLabel.entries()].sort((a, b) => a[0] - b[0])) {
    if (label === policy.goodPostureLabel) continue;
    const weight = policy.severityWeights[label] ?? 1;
    rawPenalty += (minutes / totalTime) * 100 * weight * policy.penaltyFactor;
    if (minutes > worstDuration) {
      worstLabel = label;
      worstDuration = minutes;
    }
  }
  const badPosturePenalty = Math.min(policy.penaltyCap, floorPoints(rawPenalty));

  const sessionStabilityScore = stabilityPoints(totalTime / sessions.length, sessions.length, policy);
  const totalScore = Math.max(0, Math.min(100, goodPostureScore - badPosturePenalty + sessionStabilityScore));
  const grade = gradeFor(totalScore, policy);

  const worstPosture = worstLabel === null ? "None" : postureName(worstLabel);
  const feedback =
    worstLabel === null
      ? grade.message
      : `${grade.message} Most time in a poor posture: ${worstPosture} (${round2(worstDuration)} min).`;

  return {
    date,
    totalScore,
    goodPostureScore,
    badPosturePenalty,
    sessionStabilityScore,
    monitoringTimeMinutes: round2(totalTime),
    goodPosturePercentage: round2(goodPercentage),
    worstPosture,
    worstPostureDuration: round2(worstDuration),
    grade: grade.grade,
    feedback,
  };
}
