// Seat Posture Server - Shared TypeScript interfaces and types

// ─── Result ─────────────────────────────────────────────────────────────────────

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ─── Sensor Input ───────────────────────────────────────────────────────────────

export interface InertialReading {
  accel: [number, number, number];
  gyro: [number, number, number];
}

/** A validated inbound sensor frame. Constructed per message, consumed immediately. */
export interface SensorFrame {
  messageId: number;
  deviceId: string;
  pressure: number[];
  inertial: InertialReading | null;
}

/** Fixed-length numeric vector handed to models (11 pressure or 6 inertial values). */
export type FeatureVector = number[];

// ─── Models ─────────────────────────────────────────────────────────────────────

export interface PointPredictor {
  kind: "point";
  predict(features: FeatureVector): number;
}

export interface ProbabilisticPredictor {
  kind: "probabilistic";
  predict(features: FeatureVector): number;
  /** One probability per class, in class order. */
  predictProbabilities(features: FeatureVector): number[];
}

export type ScoredModel = PointPredictor | ProbabilisticPredictor;

export interface NormalizationTransform {
  transform(features: FeatureVector): FeatureVector;
}

export interface StageModels {
  models: ReadonlyMap<string, ScoredModel>;
  transform: NormalizationTransform | null;
}

/** Loaded once at startup and shared read-only by every connection. */
export interface ModelBundle {
  stage1: StageModels;
  stage2: StageModels;
}

// ─── Classification ─────────────────────────────────────────────────────────────

export type ClassificationMethod =
  | "rule_based"
  | "ensemble_stage1"
  | "ensemble_stage1_plus_stage2"
  | "degraded_random";

export type CascadeStage = 1 | 2;

export interface ModelVote {
  model: string;
  stage: CascadeStage;
  prediction: number;
  confidence: number;
}

export interface ClassificationResult {
  label: number;
  confidence: number;
  method: ClassificationMethod;
  breakdown: ModelVote[];
  votingScores: number[];
  /** true when the stage-2 result replaced the stage-1 result */
  stage2Applied: boolean;
  failedModels: string[];
  processingTimeMs: number;
}

export type ClassificationErrorKind = "no_models" | "all_models_failed" | "transform_failed";

export interface ClassificationError {
  kind: ClassificationErrorKind;
  stage: CascadeStage;
  message: string;
  failedModels: string[];
}

// ─── Connections ────────────────────────────────────────────────────────────────

export enum ConnectionState {
  CONNECTING = "connecting",
  ACTIVE = "active",
  CLOSED = "closed",
}

export interface ClientSession {
  clientId: string;
  state: ConnectionState;
  connectedAt: Date;
  lastActivity: Date;
  predictionsCount: number;
}

// ─── Wire Messages ──────────────────────────────────────────────────────────────

export interface PredictionResponse {
  id: number;
  posture: number;
  confidence: number;
}

export interface ErrorResponse {
  id: number | "unknown";
  error: string;
  details: string;
}

export type FrameResponse = PredictionResponse | ErrorResponse;

// ─── Durable Log ────────────────────────────────────────────────────────────────

export interface PredictionRecordInput {
  clientId: string;
  deviceId: string;
  /** epoch milliseconds */
  timestamp: number;
  label: number;
  confidence: number;
  method: ClassificationMethod;
  votingScores: number[];
  breakdown: ModelVote[];
  processingTimeMs: number;
  pressure: number[] | null;
  inertial: InertialReading | null;
}

export interface PredictionRecord extends PredictionRecordInput {
  id: number;
}

export interface ConnectionRecord {
  clientId: string;
  connectedAt: number;
  disconnectedAt: number | null;
}

/** Calendar dates are YYYY-MM-DD in UTC. Both ends are inclusive. */
export interface PredictionFilter {
  startDate?: string;
  endDate?: string;
  deviceId?: string;
}

// ─── Derived Statistics ─────────────────────────────────────────────────────────

export interface PostureSession {
  postureId: number;
  postureName: string;
  /** epoch milliseconds */
  startTime: number;
  endTime: number;
  durationMinutes: number;
  avgConfidence: number;
  sampleCount: number;
}

export interface PostureTimeStats {
  postureId: number;
  postureName: string;
  totalDurationMinutes: number;
  sessionCount: number;
  averageSessionDuration: number;
  percentage: number;
  firstDetected: string;
  lastDetected: string;
}

export interface DailyScore {
  date: string;
  totalScore: number;
  goodPostureScore: number;
  badPosturePenalty: number;
  sessionStabilityScore: number;
  monitoringTimeMinutes: number;
  goodPosturePercentage: number;
  worstPosture: string;
  worstPostureDuration: number;
  grade: string;
  feedback: string;
}

export interface DailyStats {
  date: string;
  totalTimeMinutes: number;
  postureBreakdown: PostureTimeStats[];
  mostCommonPosture: string;
  worstPostureDuration: number;
}

export interface StatsSummary {
  totalMonitoringTime: number;
  totalSessions: number;
  averageSessionDuration: number;
  goodPosturePercentage: number;
  mostProblematicPosture: string;
  dataPeriod: string;
}

export interface PerformanceMetrics {
  totalClients: number;
  totalPredictions: number;
  predictionsPerSecond: number;
  avgResponseTimeMs: number;
  uptimeSeconds: number;
}
