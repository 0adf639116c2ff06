// Seat Posture Server - Entry point
// Loads configuration and models, wires the pipeline and starts both servers.

import "dotenv/config";
import { loadConfig, validateConfig } from "./config.js";
import { EnsembleClassifier } from "./ensemble-classifier.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { loadModelBundle } from "./model-loader.js";
import { PostureStatistics } from "./posture-statistics.js";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { SqliteClassificationLog } from "./sqlite-classification-log.js";
import { createStatisticsApp } from "./statistics-api.js";

export const APP_NAME = "Seat Posture Server";
export const APP_VERSION = "0.1.0";

const { config, warnings } = loadConfig();
const log = (component: string) => createConsoleLogger(component, config.logLevel);
const initLogger = log("Init");

for (const warning of warnings) {
  initLogger.warn(warning);
}

const problems = validateConfig(config);
if (problems.length > 0) {
  for (const problem of problems) initLogger.error(problem);
  process.exit(1);
}

// ─── Models ─────────────────────────────────────────────────────────────────────

initLogger.info(`Loading models from ${config.modelDir}...`);
const bundle = await loadModelBundle(config.modelDir, { logger: log("ModelLoader") });
initLogger.info(
  `Stage 1: ${bundle.stage1.models.size} models, stage 2: ${bundle.stage2.models.size} models` +
    (bundle.stage1.models.size === 0 ? " (rule-based classification only)" : ""),
);
const classifier = new EnsembleClassifier(bundle, { logger: log("Classifier") });

// ─── Storage and services ───────────────────────────────────────────────────────

initLogger.info(`Opening database ${config.databasePath}...`);
const classificationLog = new SqliteClassificationLog({ filePath: config.databasePath });

const sessionManager = new SessionManager({
  classifier,
  log: classificationLog,
  logger: log("SessionManager"),
  maxQueueDepth: config.maxQueueDepth,
  expectedPressureCount: config.fsrSensorCount,
  saveRawData: config.saveRawData,
});

const apiApp = createStatisticsApp({
  statistics: new PostureStatistics(classificationLog),
  metrics: () => sessionManager.getPerformanceMetrics(),
  countRecords: () => classificationLog.countPredictions(),
  logger: log("StatisticsApi"),
});

// ─── Start servers ──────────────────────────────────────────────────────────────

const server = createAppServer({
  sessionManager,
  apiApp,
  logger: log("Server"),
  pingIntervalMs: config.pingIntervalSeconds * 1000,
  maxClients: config.maxClients,
});

const ports = await server.listen({
  host: config.host,
  websocketPort: config.websocketPort,
  apiPort: config.apiPort,
});
sessionManager.startStatsReporter(config.statsIntervalSeconds * 1000);
initLogger.info(`${APP_NAME} v${APP_VERSION} ready: ws://${config.host}:${ports.websocketPort}, http://${config.host}:${ports.apiPort}`);

// ─── Shutdown ───────────────────────────────────────────────────────────────────

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  initLogger.info(`${signal} received, shutting down...`);
  await server.close();
  await classificationLog.close();
  initLogger.info("Shutdown complete");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        initLogger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      },
    );
  });
}
