// Seat Posture Server - Configuration
//
// Reads settings from the environment (populated from .env by dotenv in the
// entry point). Values that fail to parse fall back to their defaults and are
// reported as warnings; validateConfig() reports settings that cannot work.

import { parseLogLevel, type LogLevel } from "./logger.js";

export interface AppConfig {
  host: string;
  websocketPort: number;
  apiPort: number;
  /** WebSocket heartbeat interval in seconds. 0 disables heartbeats. */
  pingIntervalSeconds: number;
  databasePath: string;
  modelDir: string;
  logLevel: LogLevel;
  /** Throughput/latency report interval in seconds. */
  statsIntervalSeconds: number;
  maxClients: number;
  maxQueueDepth: number;
  fsrSensorCount: number;
  saveRawData: boolean;
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
  host: "0.0.0.0",
  websocketPort: 8765,
  apiPort: 8766,
  pingIntervalSeconds: 30,
  databasePath: "posture_data.db",
  modelDir: "models",
  logLevel: "INFO",
  statsIntervalSeconds: 60,
  maxClients: 100,
  maxQueueDepth: 64,
  fsrSensorCount: 11,
  saveRawData: true,
};

export interface LoadedConfig {
  config: AppConfig;
  warnings: string[];
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, warnings: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    warnings.push(`${key}="${raw}" is not an integer; using default ${fallback}`);
    return fallback;
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  return ["true", "1", "yes", "on"].includes(raw.trim().toLowerCase());
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === "" ? fallback : raw.trim();
}

export function loadConfig(env: Env = process.env): LoadedConfig {
  const warnings: string[] = [];

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (env.LOG_LEVEL !== undefined) {
    const parsed = parseLogLevel(env.LOG_LEVEL);
    if (parsed) {
      logLevel = parsed;
    } else {
      warnings.push(`LOG_LEVEL="${env.LOG_LEVEL}" is not a known level; using ${DEFAULT_CONFIG.logLevel}`);
    }
  }

  const config: AppConfig = {
    host: readString(env, "SERVER_HOST", DEFAULT_CONFIG.host),
    websocketPort: readInt(env, "WEBSOCKET_PORT", DEFAULT_CONFIG.websocketPort, warnings),
    apiPort: readInt(env, "API_PORT", DEFAULT_CONFIG.apiPort, warnings),
    pingIntervalSeconds: readInt(env, "SERVER_PING_INTERVAL", DEFAULT_CONFIG.pingIntervalSeconds, warnings),
    databasePath: readString(env, "DATABASE_PATH", DEFAULT_CONFIG.databasePath),
    modelDir: readString(env, "MODEL_DIR", DEFAULT_CONFIG.modelDir),
    logLevel,
    statsIntervalSeconds: readInt(env, "PERFORMANCE_STATS_INTERVAL", DEFAULT_CONFIG.statsIntervalSeconds, warnings),
    maxClients: readInt(env, "MAX_CLIENTS", DEFAULT_CONFIG.maxClients, warnings),
    maxQueueDepth: readInt(env, "MAX_QUEUE_DEPTH", DEFAULT_CONFIG.maxQueueDepth, warnings),
    fsrSensorCount: readInt(env, "FSR_SENSOR_COUNT", DEFAULT_CONFIG.fsrSensorCount, warnings),
    saveRawData: readBool(env, "SAVE_RAW_DATA", DEFAULT_CONFIG.saveRawData),
  };

  return { config, warnings };
}

/**
 * Returns a list of configuration errors. An empty list means the
 * configuration can be used to start the servers.
 */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];
  const inPortRange = (port: number) => port >= 1 && port <= 65535;

  if (!inPortRange(config.websocketPort)) {
    errors.push(`WEBSOCKET_PORT must be within 1-65535, got ${config.websocketPort}`);
  }
  if (!inPortRange(config.apiPort)) {
    errors.push(`API_PORT must be within 1-65535, got ${config.apiPort}`);
  }
  if (config.websocketPort === config.apiPort) {
    errors.push(`WEBSOCKET_PORT and API_PORT must differ, both are ${config.apiPort}`);
  }
  if (config.pingIntervalSeconds < 0) {
    errors.push(`SERVER_PING_INTERVAL must not be negative, got ${config.pingIntervalSeconds}`);
  }
  if (config.statsIntervalSeconds <= 0) {
    errors.push(`PERFORMANCE_STATS_INTERVAL must be positive, got ${config.statsIntervalSeconds}`);
  }
  if (config.maxClients <= 0) {
    errors.push(`MAX_CLIENTS must be positive, got ${config.maxClients}`);
  }
  if (config.maxQueueDepth <= 0) {
    errors.push(`MAX_QUEUE_DEPTH must be positive, got ${config.maxQueueDepth}`);
  }
  if (config.fsrSensorCount <= 0) {
    errors.push(`FSR_SENSOR_COUNT must be positive, got ${config.fsrSensorCount}`);
  }

  return errors;
}
