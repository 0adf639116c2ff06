// Seat Posture Server - Posture sessions
//
// Turns the ordered classification log into contiguous runs of one posture.
// A session lasts from its first record to the first record of the next
// different posture; the last session ends at the last record in range.

import { filterBounds } from "./classification-log.js";
import { postureName } from "./posture-labels.js";
import type { PostureSession, PostureTimeStats, PredictionFilter, PredictionRecordInput } from "./types.js";

const MS_PER_MINUTE = 60_000;

export type SessionSource = Pick<PredictionRecordInput, "timestamp" | "label" | "confidence" | "deviceId">;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

interface Run {
  label: number;
  start: number;
  end: number;
  confidenceSum: number;
  samples: number;
}

function toSession(run: Run): PostureSession {
  return {
    postureId: run.label,
    postureName: postureName(run.label),
    startTime: run.start,
    endTime: run.end,
    durationMinutes: (run.end - run.start) / MS_PER_MINUTE,
    avgConfidence: run.confidenceSum / run.samples,
    sampleCount: run.samples,
  };
}

/**
 * Segment records into posture sessions.
 *
 * Runs with no positive duration are dropped, and neighbours left sharing a
 * label are merged, so the sessions tile [first record, last record] with no
 * gaps and no two adjacent sessions share a posture.
 */
export function segmentSessions(records: readonly SessionSource[], filter: PredictionFilter = {}): PostureSession[] {
  const { from, until } = filterBounds(filter);
  const selected = records
    .filter(
      (r) =>
        (from === null || r.timestamp >= from) &&
        (until === null || r.timestamp < until) &&
        (filter.deviceId === undefined || r.deviceId === filter.deviceId),
    )
    .map((r, index) => ({ r, index }))
    .sort((a, b) => a.r.timestamp - b.r.timestamp || a.index - b.index)
    .map(({ r }) => r);

  if (selected.length === 0) return [];

  const runs: Run[] = [];
  for (const record of selected) {
    const current = runs[runs.length - 1];
    if (current && current.label === record.label) {
      current.confidenceSum += record.confidence;
      current.samples++;
    } else {
      if (current) current.end = record.timestamp;
      runs.push({
        label: record.label,
        start: record.timestamp,
        end: record.timestamp,
        confidenceSum: record.confidence,
        samples: 1,
      });
    }
  }
  runs[runs.length - 1].end = selected[selected.length - 1].timestamp;

  const merged: Run[] = [];
  for (const run of runs) {
    if (run.end <= run.start) continue;
    const previous = merged[merged.length - 1];
    if (previous && previous.label === run.label) {
      previous.end = run.end;
      previous.confidenceSum += run.confidenceSum;
      previous.samples += run.samples;
    } else {
      merged.push({ ...run });
    }
  }

  return merged.map(toSession);
}

/** Per-posture totals, largest total duration first. */
export function summarizePostures(sessions: readonly PostureSession[]): PostureTimeStats[] {
  const totalTime = sessions.reduce((sum, s) => sum + s.durationMinutes, 0);
  const byLabel = new Map<number, { total: number; count: number; first: number; last: number }>();

  for (const s of sessions) {
    const entry = byLabel.get(s.postureId);
    if (entry) {
      entry.total += s.durationMinutes;
      entry.count++;
      entry.first = Math.min(entry.first, s.startTime);
      entry.last = Math.max(entry.last, s.endTime);
    } else {
      byLabel.set(s.postureId, { total: s.durationMinutes, count: 1, first: s.startTime, last: s.endTime });
    }
  }

  return [...byLabel.entries()]
    .map(([postureId, e]) => ({
      postureId,
      postureName: postureName(postureId),
      totalDurationMinutes: round2(e.total),
      sessionCount: e.count,
      averageSessionDuration: round2(e.total / e.count),
      percentage: totalTime > 0 ? round2((e.total / totalTime) * 100) : 0,
      firstDetected: new Date(e.first).toISOString(),
      lastDetected: new Date(e.last).toISOString(),
    }))
    .sort((a, b) => b.totalDurationMinutes - a.totalDurationMinutes || a.postureId - b.postureId);
}
