// Seat Posture Server - Posture statistics over the classification log

import type { ClassificationLog, ResetCounts } from "./classification-log.js";
import { shiftDateKey, toDateKey } from "./dates.js";
import { NORMAL_POSTURE } from "./posture-labels.js";
import { DEFAULT_SCORING_POLICY, scoreDay, type ScoringPolicy } from "./posture-score.js";
import { round2, segmentSessions, summarizePostures } from "./posture-sessions.js";
import type {
  DailyScore,
  DailyStats,
  PostureSession,
  PostureTimeStats,
  PredictionFilter,
  StatsSummary,
} from "./types.js";

export const DEFAULT_SESSION_LIMIT = 100;
export const DEFAULT_SUMMARY_DAYS = 7;
/** Ten years; the API refuses longer look-backs. */
export const MAX_SUMMARY_DAYS = 3650;

export interface NumberedSession extends PostureSession {
  sessionId: number;
}

export interface PostureStatisticsOptions {
  now?: () => number;
  policy?: ScoringPolicy;
}

export class PostureStatistics {
  private readonly log: ClassificationLog;
  private readonly now: () => number;
  private readonly policy: ScoringPolicy;

  constructor(log: ClassificationLog, options: PostureStatisticsOptions = {}) {
    this.log = log;
    this.now = options.now ?? Date.now;
    this.policy = options.policy ?? DEFAULT_SCORING_POLICY;
  }

  today(): string {
    return toDateKey(this.now());
  }

  async sessions(filter: PredictionFilter = {}): Promise<PostureSession[]> {
    return segmentSessions(await this.log.queryPredictions(filter), filter);
  }

  async postureStats(filter: PredictionFilter = {}): Promise<PostureTimeStats[]> {
    return summarizePostures(await this.sessions(filter));
  }

  /** The most recent `limit` sessions, numbered from 1 in chronological order. */
  async recentSessions(filter: PredictionFilter = {}, limit = DEFAULT_SESSION_LIMIT): Promise<NumberedSession[]> {
    const all = await this.sessions(filter);
    const recent = limit > 0 ? all.slice(-limit) : [];
    return recent.map((s, i) => ({ ...s, sessionId: i + 1 }));
  }

  /** Null when nothing was recorded that day. */
  async dailyStats(date: string, deviceId?: string): Promise<DailyStats | null> {
    const breakdown = await this.postureStats({ startDate: date, endDate: date, deviceId });
    if (breakdown.length === 0) return null;

    const bad = breakdown.filter((s) => s.postureId !== NORMAL_POSTURE);
    return {
      date,
      totalTimeMinutes: round2(breakdown.reduce((sum, s) => sum + s.totalDurationMinutes, 0)),
      postureBreakdown: breakdown,
      mostCommonPosture: breakdown[0].postureName,
      worstPostureDuration: bad.length > 0 ? bad[0].totalDurationMinutes : 0,
    };
  }

  async summary(days = DEFAULT_SUMMARY_DAYS, deviceId?: string): Promise<StatsSummary> {
    const endDate = this.today();
    const startDate = shiftDateKey(endDate, -days);
    const dataPeriod = `${startDate} ~ ${endDate}`;
    const stats = await this.postureStats({ startDate, endDate, deviceId });

    if (stats.length === 0) {
      return {
        totalMonitoringTime: 0,
        totalSessions: 0,
        averageSessionDuration: 0,
        goodPosturePercentage: 0,
        mostProblematicPosture: "No data",
        dataPeriod,
      };
    }

    const totalTime = stats.reduce((sum, s) => sum + s.totalDurationMinutes, 0);
    const totalSessions = stats.reduce((sum, s) => sum + s.sessionCount, 0);
    const good = stats.find((s) => s.postureId === NORMAL_POSTURE);
    const worst = stats.find((s) => s.postureId !== NORMAL_POSTURE);

    return {
      totalMonitoringTime: round2(totalTime),
      totalSessions,
      averageSessionDuration: totalSessions > 0 ? round2(totalTime / totalSessions) : 0,
      goodPosturePercentage: good ? good.percentage : 0,
      mostProblematicPosture: worst ? worst.postureName : "None",
      dataPeriod,
    };
  }

  async dailyScore(date: string, deviceId?: string): Promise<DailyScore> {
    return scoreDay(date, await this.sessions({ startDate: date, endDate: date, deviceId }), this.policy);
  }

  async reset(): Promise<ResetCounts> {
    return this.log.resetAll();
  }
}
