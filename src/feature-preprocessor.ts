// Seat Posture Server - Feature preprocessing and frame validation

import { err, ok } from "./types.js";
import type { FeatureVector, InertialReading, Result, SensorFrame } from "./types.js";

export const PRESSURE_FEATURE_COUNT = 11;
export const INERTIAL_FEATURE_COUNT = 6;

/**
 * Right-pads with zeros or truncates so the result has exactly
 * `expectedLength` elements. Element order is preserved.
 */
export function normalizeFeatures(raw: readonly number[], expectedLength: number): FeatureVector {
  if (raw.length >= expectedLength) {
    return raw.slice(0, expectedLength);
  }
  const padded = raw.slice();
  while (padded.length < expectedLength) {
    padded.push(0);
  }
  return padded;
}

export function inertialToFeatures(inertial: InertialReading): FeatureVector {
  return normalizeFeatures([...inertial.accel, ...inertial.gyro], INERTIAL_FEATURE_COUNT);
}

// ─── Validation ─────────────────────────────────────────────────────────────────

export interface FrameValidationError {
  /** The message id when one could be read from the input */
  messageId: number | null;
  message: string;
}

export interface ParsedFrame {
  frame: SensorFrame;
  /** Non-fatal findings (negative pressure, dropped IMU block, unexpected sensor count) */
  warnings: string[];
}

export interface PressureValidation {
  valid: boolean;
  reason?: string;
  negativeValues: number[];
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Pressure vectors must be non-empty arrays of finite numbers. Negative
 * readings are reported but accepted: noisy hardware produces them and the
 * frame is still usable.
 */
export function validatePressureVector(value: unknown): PressureValidation {
  if (!Array.isArray(value)) {
    return { valid: false, reason: "FSR must be an array of numbers", negativeValues: [] };
  }
  if (value.length === 0) {
    return { valid: false, reason: "FSR must not be empty", negativeValues: [] };
  }
  const negativeValues: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const v: unknown = value[i];
    if (!isFiniteNumber(v)) {
      return { valid: false, reason: `FSR[${i}] is not a number`, negativeValues: [] };
    }
    if (v < 0) negativeValues.push(v);
  }
  return { valid: true, negativeValues };
}

function readTriple(value: unknown): [number, number, number] | null {
  if (!Array.isArray(value) || value.length !== 3) return null;
  const [a, b, c]: unknown[] = value;
  if (!isFiniteNumber(a) || !isFiniteNumber(b) || !isFiniteNumber(c)) return null;
  return [a, b, c];
}

function readInertial(value: unknown): InertialReading | null {
  if (typeof value !== "object" || value === null) return null;
  const accel = readTriple("accel" in value ? value.accel : undefined);
  const gyro = readTriple("gyro" in value ? value.gyro : undefined);
  if (!accel || !gyro) return null;
  return { accel, gyro };
}

/**
 * Validates a decoded inbound message and builds a SensorFrame.
 *
 * `id`, `device_id` and `FSR` are required. `IMU` is optional; a malformed
 * IMU block is dropped with a warning instead of rejecting the frame.
 */
export function parseSensorFrame(
  data: unknown,
  expectedPressureCount: number = PRESSURE_FEATURE_COUNT,
): Result<ParsedFrame, FrameValidationError> {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return err({ messageId: null, message: "Frame must be a JSON object" });
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(data));
  const messageId = isFiniteNumber(record.id) ? record.id : null;

  for (const field of ["id", "device_id", "FSR"]) {
    if (!(field in record)) {
      return err({ messageId, message: `Missing required field: ${field}` });
    }
  }

  if (messageId === null) {
    return err({ messageId: null, message: "id must be a number" });
  }

  const deviceId = record.device_id;
  if (typeof deviceId !== "string" || deviceId.length === 0) {
    return err({ messageId, message: "device_id must be a non-empty string" });
  }

  const pressureCheck = validatePressureVector(record.FSR);
  if (!pressureCheck.valid || !Array.isArray(record.FSR)) {
    return err({ messageId, message: pressureCheck.reason ?? "Invalid FSR data" });
  }
  const pressure = record.FSR.filter(isFiniteNumber);

  const warnings: string[] = [];
  if (pressureCheck.negativeValues.length > 0) {
    warnings.push(`Negative FSR values: ${pressureCheck.negativeValues.join(", ")}`);
  }
  if (pressure.length !== expectedPressureCount) {
    warnings.push(`Expected ${expectedPressureCount} FSR values, got ${pressure.length}`);
  }

  let inertial: InertialReading | null = null;
  if (record.IMU !== undefined && record.IMU !== null) {
    inertial = readInertial(record.IMU);
    if (!inertial) {
      warnings.push("IMU block ignored: expected { accel: [x,y,z], gyro: [x,y,z] }");
    }
  }

  return ok({
    frame: { messageId, deviceId, pressure, inertial },
    warnings,
  });
}
