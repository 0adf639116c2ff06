// Seat Posture Server - Session Manager
// Owns every live connection: its identity, its pending frames and its
// statistics. Frames of one connection are classified strictly one at a time
// in arrival order; different connections interleave freely on the event loop.
//
// Connecting → Active → Closed. A closed session never becomes active again.

import { v4 as uuidv4 } from "uuid";
import type { ClassificationLog } from "./classification-log.js";
import type { PostureClassifier } from "./ensemble-classifier.js";
import { PRESSURE_FEATURE_COUNT, parseSensorFrame } from "./feature-preprocessor.js";
import { FrameQueue } from "./frame-queue.js";
import { errorMessage, silentLogger, type Logger } from "./logger.js";
import { PerformanceMonitor, formatMetrics } from "./performance-monitor.js";
import { ConnectionState } from "./types.js";
import type {
  ClientSession,
  ErrorResponse,
  FrameResponse,
  PerformanceMetrics,
  PredictionRecordInput,
  SensorFrame,
} from "./types.js";

// ─── Error payload texts ────────────────────────────────────────────────────────

export const ERROR_INVALID_JSON = "Invalid JSON format";
export const ERROR_INVALID_FRAME = "Invalid sensor frame";
export const ERROR_QUEUE_FULL = "Too many pending frames";
export const ERROR_PROCESSING = "Data processing failed";

// ─── Dependency injection interface ─────────────────────────────────────────────

/** The slice of a connection the manager needs. */
export interface ClientTransport {
  send(data: string): void | Promise<void>;
  isOpen(): boolean;
}

export interface SessionManagerDeps {
  classifier: PostureClassifier;
  log: ClassificationLog;
  logger?: Logger;
  /** Wall clock for timestamps (epoch ms) */
  now?: () => number;
  maxQueueDepth?: number;
  expectedPressureCount?: number;
  /** Store the raw FSR/IMU arrays alongside each prediction */
  saveRawData?: boolean;
}

/** A raw message waiting for classification. */
interface PendingFrame {
  raw: string;
  /** Ids of messages refused while this was the newest queued frame; answered after it */
  rejections: Array<number | "unknown">;
}

interface ClientEntry {
  session: ClientSession;
  transport: ClientTransport;
  queue: FrameQueue<PendingFrame>;
  /** Settles when the current drain pass finishes */
  drain: Promise<void> | null;
}

export function roundConfidence(confidence: number): number {
  return Math.round(confidence * 1000) / 1000;
}

export class SessionManager {
  private readonly clients: Map<string, ClientEntry> = new Map();
  private readonly deps: SessionManagerDeps;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly monitor: PerformanceMonitor;
  private statsTimer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
    this.monitor = new PerformanceMonitor({ now: this.now });
  }

  // ─── Connection lifecycle ───────────────────────────────────────────────────

  /** Creates a session for a freshly opened connection and makes it active. */
  registerClient(transport: ClientTransport): ClientSession {
    const clientId = uuidv4();
    const connectedAt = new Date(this.now());
    const session: ClientSession = {
      clientId,
      state: ConnectionState.CONNECTING,
      connectedAt,
      lastActivity: connectedAt,
      predictionsCount: 0,
    };

    this.clients.set(clientId, {
      session,
      transport,
      queue: new FrameQueue<PendingFrame>(this.deps.maxQueueDepth),
      drain: null,
    });

    this.deps.log.recordConnection(clientId, connectedAt.getTime()).catch((e: unknown) => {
      this.logger.warn(`Could not record connection of ${clientId}: ${errorMessage(e)}`);
    });

    session.state = ConnectionState.ACTIVE;
    this.logger.info(`Client ${clientId} connected (${this.clients.size} active)`);
    return { ...session };
  }

  /**
   * Removes a client. Queued frames are dropped; a frame already being
   * classified finishes but its result is discarded. Idempotent.
   */
  async unregisterClient(clientId: string): Promise<void> {
    const entry = this.clients.get(clientId);
    if (!entry) return;

    entry.session.state = ConnectionState.CLOSED;
    this.clients.delete(clientId);
    const rejected = entry.queue.framesRejected;
    const dropped = entry.queue.clear();

    this.logger.info(
      `Client ${clientId} disconnected after ${entry.session.predictionsCount} predictions` +
        (rejected > 0 ? `, ${rejected} frames rejected` : "") +
        (dropped > 0 ? `, ${dropped} queued frames dropped` : "") +
        ` (${this.clients.size} active)`,
    );

    try {
      await this.deps.log.recordDisconnection(clientId, this.now());
    } catch (e) {
      this.logger.warn(`Could not record disconnection of ${clientId}: ${errorMessage(e)}`);
    }
  }

  /** Unregisters every client and stops the stats reporter. */
  async shutdown(): Promise<void> {
    this.stopStatsReporter();
    await Promise.all([...this.clients.keys()].map((id) => this.unregisterClient(id)));
  }

  getSession(clientId: string): ClientSession | undefined {
    const entry = this.clients.get(clientId);
    return entry ? { ...entry.session } : undefined;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  // ─── Frames ─────────────────────────────────────────────────────────────────

  /**
   * Queues a raw inbound message for classification. Returns false when the
   * client is unknown or its queue is full. A message refused by a full queue
   * is answered with an error payload right after the reply to the frame that
   * was newest in the queue, so replies keep arrival order.
   */
  submitFrame(clientId: string, raw: string): boolean {
    const entry = this.clients.get(clientId);
    if (!entry || entry.session.state !== ConnectionState.ACTIVE) {
      return false;
    }

    if (!entry.queue.enqueue({ raw, rejections: [] })) {
      this.logger.warn(`Client ${clientId} queue full (${entry.queue.capacity}); frame rejected`);
      const newest = entry.queue.peekLast();
      if (newest) {
        newest.rejections.push(peekMessageId(raw));
      } else {
        this.respondError(entry, peekMessageId(raw), ERROR_QUEUE_FULL, this.queueFullDetails(entry));
      }
      return false;
    }

    if (!entry.drain) {
      entry.drain = this.drainQueue(entry)
        .catch((e: unknown) => {
          this.logger.error(`Frame loop for ${clientId} stopped: ${errorMessage(e)}`);
        })
        .finally(() => {
          entry.drain = null;
        });
    }
    return true;
  }

  /** Resolves once every frame queued for `clientId` so far has been handled. */
  async whenIdle(clientId: string): Promise<void> {
    const entry = this.clients.get(clientId);
    while (entry?.drain) {
      await entry.drain;
    }
  }

  private async drainQueue(entry: ClientEntry): Promise<void> {
    while (entry.session.state === ConnectionState.ACTIVE) {
      const next = entry.queue.dequeue();
      if (!next) return;
      await this.processFrame(entry, next.raw);
      for (const id of next.rejections) {
        await this.sendResponse(entry, { id, error: ERROR_QUEUE_FULL, details: this.queueFullDetails(entry) });
      }
    }
  }

  private queueFullDetails(entry: ClientEntry): string {
    return `At most ${entry.queue.capacity} frames may be pending`;
  }

  private async processFrame(entry: ClientEntry, raw: string): Promise<void> {
    const { clientId } = entry.session;
    const started = performance.now();
    let messageId: number | "unknown" = "unknown";

    try {
      let decoded: unknown;
      try {
        decoded = JSON.parse(raw);
      } catch (e) {
        this.logger.warn(`Client ${clientId} sent invalid JSON: ${errorMessage(e)}`);
        await this.sendResponse(entry, { id: "unknown", error: ERROR_INVALID_JSON, details: errorMessage(e) });
        return;
      }

      const parsed = parseSensorFrame(decoded, this.deps.expectedPressureCount ?? PRESSURE_FEATURE_COUNT);
      if (!parsed.ok) {
        this.logger.warn(`Client ${clientId} sent an invalid frame: ${parsed.error.message}`);
        await this.sendResponse(entry, {
          id: parsed.error.messageId ?? "unknown",
          error: ERROR_INVALID_FRAME,
          details: parsed.error.message,
        });
        return;
      }

      const { frame, warnings } = parsed.value;
      messageId = frame.messageId;
      for (const warning of warnings) {
        this.logger.warn(`Client ${clientId} frame ${frame.messageId}: ${warning}`);
      }

      const result = this.deps.classifier.classify(frame.pressure, frame.inertial);
      if (entry.session.state !== ConnectionState.ACTIVE) {
        this.logger.debug(`Discarding result for closed client ${clientId}`);
        return;
      }

      const confidence = roundConfidence(result.confidence);
      const delivered = await this.sendResponse(entry, { id: frame.messageId, posture: result.label, confidence });
      if (!delivered) return;

      this.logger.debug(
        `Client ${clientId} frame ${frame.messageId}: posture ${result.label} ` +
          `(${confidence}, ${result.method}, ${result.processingTimeMs.toFixed(2)}ms)`,
      );

      await this.appendToLog(entry.session, frame, {
        label: result.label,
        confidence: result.confidence,
        method: result.method,
        votingScores: result.votingScores,
        breakdown: result.breakdown,
        processingTimeMs: result.processingTimeMs,
      });

      entry.session.predictionsCount++;
      entry.session.lastActivity = new Date(this.now());
      this.monitor.recordPrediction(performance.now() - started);
    } catch (e) {
      this.logger.error(`Client ${clientId} frame processing failed: ${errorMessage(e)}`);
      await this.sendResponse(entry, { id: messageId, error: ERROR_PROCESSING, details: errorMessage(e) });
    }
  }

  private async appendToLog(
    session: ClientSession,
    frame: SensorFrame,
    result: Pick<
      PredictionRecordInput,
      "label" | "confidence" | "method" | "votingScores" | "breakdown" | "processingTimeMs"
    >,
  ): Promise<void> {
    const saveRaw = this.deps.saveRawData ?? true;
    try {
      await this.deps.log.appendPrediction({
        clientId: session.clientId,
        deviceId: frame.deviceId,
        timestamp: this.now(),
        ...result,
        pressure: saveRaw ? frame.pressure : null,
        inertial: saveRaw ? frame.inertial : null,
      });
    } catch (e) {
      this.logger.error(`Could not store prediction for ${session.clientId}: ${errorMessage(e)}`);
    }
  }

  // ─── Transport ──────────────────────────────────────────────────────────────

  private respondError(entry: ClientEntry, id: number | "unknown", error: string, details: string): void {
    const payload: ErrorResponse = { id, error, details };
    this.sendResponse(entry, payload).catch((e: unknown) => {
      this.logger.error(`Error response to ${entry.session.clientId} failed: ${errorMessage(e)}`);
    });
  }

  /**
   * Sends one message on the client's connection. A closed or failing
   * connection unregisters the client; there is no retry.
   */
  private async sendResponse(entry: ClientEntry, message: FrameResponse): Promise<boolean> {
    const { clientId } = entry.session;
    if (entry.session.state !== ConnectionState.ACTIVE) return false;

    if (!entry.transport.isOpen()) {
      this.logger.warn(`Connection to ${clientId} is closed; unregistering`);
      await this.unregisterClient(clientId);
      return false;
    }

    try {
      await entry.transport.send(JSON.stringify(message));
      return true;
    } catch (e) {
      this.logger.warn(`Send to ${clientId} failed: ${errorMessage(e)}; unregistering`);
      await this.unregisterClient(clientId);
      return false;
    }
  }

  // ─── Statistics ─────────────────────────────────────────────────────────────

  getPerformanceMetrics(): Readonly<PerformanceMetrics> {
    return this.monitor.snapshot(this.clients.size);
  }

  /** Logs a metrics snapshot every `intervalMs`. Replaces any running reporter. */
  startStatsReporter(intervalMs: number): void {
    this.stopStatsReporter();
    this.statsTimer = setInterval(() => {
      this.logger.info(`Performance: ${formatMetrics(this.getPerformanceMetrics())}`);
    }, intervalMs);
    this.statsTimer.unref();
  }

  stopStatsReporter(): void {
    if (this.statsTimer) {
      clearInterval(this.statsTimer);
      this.statsTimer = null;
    }
  }
}

/** Best-effort id lookup for messages rejected before they are parsed. */
function peekMessageId(raw: string): number | "unknown" {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return "unknown";
  }
  if (typeof value === "object" && value !== null && "id" in value && typeof value.id === "number") {
    return value.id;
  }
  return "unknown";
}
