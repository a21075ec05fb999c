import express, { type ErrorRequestHandler } from "express";
import cors from "cors";

import { createCoursesRouter } from "./routes/courses";
import { CourseStore } from "../stores/courseStore";
import type { Telemetry } from "../telemetry/telemetry";

export interface AppDeps {
  store: CourseStore;
  telemetry: Telemetry;
  corsOrigins: string[];
}

// body-parser marks its errors with a `type`, e.g. "entity.parse.failed"
function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ error: "Invalid request body" });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  res.status(500).json({ error: "Internal server error" });
};

export function createApp({ store, telemetry, corsOrigins }: AppDeps) {
  const app = express();

  // Middleware
  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Routes
  app.use("/api/courses", createCoursesRouter({ store, telemetry }));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use(errorHandler);

  return app;
}
