import { describe, it, expect } from "vitest";
import {
  inertialToFeatures,
  normalizeFeatures,
  parseSensorFrame,
  validatePressureVector,
} from "./feature-preprocessor.js";

const PRESSURE = [489, 625, 581, 483, 375, 517, 571, 530, 372, 398, 248];

describe("normalizeFeatures", () => {
  it("pads short vectors with zeros on the right", () => {
    expect(normalizeFeatures([1, 2, 3], 5)).toEqual([1, 2, 3, 0, 0]);
  });

  it("truncates long vectors", () => {
    expect(normalizeFeatures([1, 2, 3, 4, 5, 6, 7], 4)).toEqual([1, 2, 3, 4]);
  });

  it("returns a copy for exact-length input", () => {
    const input = [1, 2, 3];
    const out = normalizeFeatures(input, 3);
    expect(out).toEqual(input);
    expect(out).not.toBe(input);
  });

  it("pads an empty vector to all zeros", () => {
    expect(normalizeFeatures([], 3)).toEqual([0, 0, 0]);
  });
});

describe("inertialToFeatures", () => {
  it("concatenates accel then gyro", () => {
    expect(inertialToFeatures({ accel: [0.1, 0.2, 9.8], gyro: [1, 2, 3] })).toEqual([0.1, 0.2, 9.8, 1, 2, 3]);
  });
});

describe("validatePressureVector", () => {
  it("accepts non-empty numeric arrays", () => {
    expect(validatePressureVector([1, 2, 3])).toEqual({ valid: true, negativeValues: [] });
  });

  it("accepts negative readings and reports them", () => {
    expect(validatePressureVector([1, -2, 3, -0.5])).toEqual({ valid: true, negativeValues: [-2, -0.5] });
  });

  it("rejects non-arrays", () => {
    expect(validatePressureVector("123")).toEqual({
      valid: false,
      reason: "FSR must be an array of numbers",
      negativeValues: [],
    });
  });

  it("rejects empty arrays", () => {
    expect(validatePressureVector([]).reason).toBe("FSR must not be empty");
  });

  it("rejects non-numeric elements", () => {
    expect(validatePressureVector([1, "2", 3]).reason).toBe("FSR[1] is not a number");
    expect(validatePressureVector([1, null]).reason).toBe("FSR[1] is not a number");
  });
});

describe("parseSensorFrame", () => {
  it("builds a frame from a complete message", () => {
    const result = parseSensorFrame({
      id: 7,
      device_id: "chair-1",
      FSR: PRESSURE,
      IMU: { accel: [0, 0.1, 9.8], gyro: [0.01, 0.02, 0.03] },
    });
    expect(result).toEqual({
      ok: true,
      value: {
        frame: {
          messageId: 7,
          deviceId: "chair-1",
          pressure: PRESSURE,
          inertial: { accel: [0, 0.1, 9.8], gyro: [0.01, 0.02, 0.03] },
        },
        warnings: [],
      },
    });
  });

  it("treats IMU as optional", () => {
    const result = parseSensorFrame({ id: 1, device_id: "chair-1", FSR: PRESSURE });
    expect(result.ok && result.value.frame.inertial).toBeNull();
  });

  it("drops a malformed IMU block with a warning", () => {
    const result = parseSensorFrame({ id: 1, device_id: "chair-1", FSR: PRESSURE, IMU: { accel: [1, 2] } });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.frame.inertial).toBeNull();
    expect(result.value.warnings).toEqual(["IMU block ignored: expected { accel: [x,y,z], gyro: [x,y,z] }"]);
  });

  it("warns about negative values and unexpected sensor counts", () => {
    const result = parseSensorFrame({ id: 3, device_id: "chair-1", FSR: [10, -1, 5] });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.warnings).toEqual(["Negative FSR values: -1", "Expected 11 FSR values, got 3"]);
  });

  it("honours a configured sensor count", () => {
    const result = parseSensorFrame({ id: 3, device_id: "chair-1", FSR: [1, 2, 3] }, 3);
    expect(result.ok && result.value.warnings).toEqual([]);
  });

  it("rejects non-object messages", () => {
    expect(parseSensorFrame([1, 2])).toEqual({
      ok: false,
      error: { messageId: null, message: "Frame must be a JSON object" },
    });
    expect(parseSensorFrame(null).ok).toBe(false);
  });

  it("reports the first missing field and echoes the id when present", () => {
    expect(parseSensorFrame({ device_id: "chair-1", FSR: PRESSURE })).toEqual({
      ok: false,
      error: { messageId: null, message: "Missing required field: id" },
    });
    expect(parseSensorFrame({ id: 5, FSR: PRESSURE })).toEqual({
      ok: false,
      error: { messageId: 5, message: "Missing required field: device_id" },
    });
    expect(parseSensorFrame({ id: 5, device_id: "chair-1" })).toEqual({
      ok: false,
      error: { messageId: 5, message: "Missing required field: FSR" },
    });
  });

  it("rejects a non-numeric id", () => {
    expect(parseSensorFrame({ id: "5", device_id: "chair-1", FSR: PRESSURE })).toEqual({
      ok: false,
      error: { messageId: null, message: "id must be a number" },
    });
  });

  it("rejects an empty device id", () => {
    const result = parseSensorFrame({ id: 5, device_id: "", FSR: PRESSURE });
    expect(result.ok === false && result.error.message).toBe("device_id must be a non-empty string");
  });

  it("rejects bad pressure data with the validation reason", () => {
    expect(parseSensorFrame({ id: 5, device_id: "chair-1", FSR: [] })).toEqual({
      ok: false,
      error: { messageId: 5, message: "FSR must not be empty" },
    });
  });
});
