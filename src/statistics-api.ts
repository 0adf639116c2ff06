// Seat Posture Server - Statistics HTTP API (Express)

import express, { type Express, type Request, type Response } from "express";
import { isDateKey } from "./dates.js";
import { errorMessage, silentLogger, type Logger } from "./logger.js";
import { POSTURE_LABELS } from "./posture-labels.js";
import {
  DEFAULT_SESSION_LIMIT,
  DEFAULT_SUMMARY_DAYS,
  MAX_SUMMARY_DAYS,
  type PostureStatistics,
} from "./posture-statistics.js";
import type { PerformanceMetrics, PredictionFilter } from "./types.js";

export const SERVICE_NAME = "Seat Posture Statistics API";
export const SERVICE_VERSION = "0.1.0";

export interface StatisticsApiDeps {
  statistics: PostureStatistics;
  /** Live throughput snapshot from the connection side */
  metrics: () => PerformanceMetrics;
  countRecords: () => Promise<number>;
  logger?: Logger;
}

// ─── Request parsing ────────────────────────────────────────────────────────────

/** A 400-worthy problem with the request. */
export class BadRequestError extends Error {
  constructor(
    readonly error: string,
    readonly details: string,
  ) {
    super(`${error}: ${details}`);
    this.name = "BadRequestError";
  }
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new BadRequestError("Invalid parameter", `${name} must be given once`);
  }
  return value;
}

function dateParam(value: string | undefined, name: string): string | undefined {
  if (value !== undefined && !isDateKey(value)) {
    throw new BadRequestError("Invalid date", `${name} must be a date in YYYY-MM-DD format, got "${value}"`);
  }
  return value;
}

function positiveIntParam(req: Request, name: string, fallback: number, max?: number): number {
  const raw = queryString(req, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(value) || value < 1 || (max !== undefined && value > max)) {
    const bound = max === undefined ? "" : ` no greater than ${max}`;
    throw new BadRequestError("Invalid number", `${name} must be a positive integer${bound}, got "${raw}"`);
  }
  return value;
}

function readFilter(req: Request): PredictionFilter {
  return {
    startDate: dateParam(queryString(req, "start_date"), "start_date"),
    endDate: dateParam(queryString(req, "end_date"), "end_date"),
    deviceId: queryString(req, "device_id"),
  };
}

// ─── App ────────────────────────────────────────────────────────────────────────

type Handler = (req: Request, res: Response) => Promise<void>;

export function createStatisticsApp(deps: StatisticsApiDeps): Express {
  const { statistics, metrics, countRecords } = deps;
  const logger = deps.logger ?? silentLogger;
  const app = express();

  /** Maps thrown errors onto `{ error, details }` responses. */
  const route =
    (name: string, handler: Handler) =>
    (req: Request, res: Response): void => {
      handler(req, res).catch((e: unknown) => {
        if (e instanceof BadRequestError) {
          res.status(400).json({ error: e.error, details: e.details });
          return;
        }
        logger.error(`${name} failed: ${errorMessage(e)}`);
        res.status(500).json({ error: `${name} failed`, details: errorMessage(e) });
      });
    };

  app.get(
    "/",
    route("Status", async (_req, res) => {
      res.json({
        message: SERVICE_NAME,
        version: SERVICE_VERSION,
        status: "running",
        timestamp: new Date().toISOString(),
      });
    }),
  );

  app.get(
    "/health",
    route("Health check", async (_req, res) => {
      let totalRecords: number;
      try {
        totalRecords = await countRecords();
      } catch (e) {
        logger.error(`Health check: database unavailable: ${errorMessage(e)}`);
        res.status(500).json({ error: "Database connection failed", details: errorMessage(e) });
        return;
      }
      res.json({
        status: "healthy",
        database: "connected",
        totalRecords,
        timestamp: new Date().toISOString(),
      });
    }),
  );

  app.get(
    "/statistics/postures",
    route("Posture statistics", async (req, res) => {
      res.json(await statistics.postureStats(readFilter(req)));
    }),
  );

  app.get(
    "/statistics/daily/:date",
    route("Daily statistics", async (req, res) => {
      const date = dateParam(req.params.date, "date") ?? req.params.date;
      const stats = await statistics.dailyStats(date, queryString(req, "device_id"));
      if (!stats) {
        res.status(404).json({ error: "Not found", details: `No data found for date: ${date}` });
        return;
      }
      res.json(stats);
    }),
  );

  app.get(
    "/statistics/sessions",
    route("Session list", async (req, res) => {
      const limit = positiveIntParam(req, "limit", DEFAULT_SESSION_LIMIT);
      res.json(await statistics.recentSessions(readFilter(req), limit));
    }),
  );

  app.get(
    "/statistics/summary",
    route("Summary", async (req, res) => {
      const days = positiveIntParam(req, "days", DEFAULT_SUMMARY_DAYS, MAX_SUMMARY_DAYS);
      res.json(await statistics.summary(days, queryString(req, "device_id")));
    }),
  );

  // Registered before /:date so "today" is not read as a date
  app.get(
    "/statistics/score/today",
    route("Today's score", async (req, res) => {
      res.json(await statistics.dailyScore(statistics.today(), queryString(req, "device_id")));
    }),
  );

  app.get(
    "/statistics/score/:date",
    route("Daily score", async (req, res) => {
      const date = dateParam(req.params.date, "date") ?? req.params.date;
      res.json(await statistics.dailyScore(date, queryString(req, "device_id")));
    }),
  );

  app.get(
    "/statistics/performance",
    route("Performance", async (_req, res) => {
      res.json(metrics());
    }),
  );

  app.delete(
    "/data/reset",
    route("Data reset", async (req, res) => {
      if (queryString(req, "confirm") !== "true") {
        throw new BadRequestError("Confirmation required", "Pass confirm=true to delete all data");
      }
      const counts = await statistics.reset();
      const deletedRecords = counts.predictions + counts.connections;
      logger.warn(`All data reset: ${deletedRecords} records deleted`);
      res.json({
        success: true,
        message: `Deleted ${deletedRecords} records`,
        deletedRecords,
        resetTimestamp: new Date().toISOString(),
      });
    }),
  );

  app.get(
    "/postures",
    route("Posture labels", async (_req, res) => {
      res.json({
        postures: POSTURE_LABELS.map(({ id, name, description }) => ({ id, name, description })),
        totalPostures: POSTURE_LABELS.length,
      });
    }),
  );

  return app;
}
