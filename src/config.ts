/**
 * Application configuration, read from the environment.
 * `.env` is loaded by the entry points through dotenv before this runs.
 */

import path from "path";

export interface TelemetryConfig {
  enabled: boolean;
  serviceName: string;
  otlpEndpoint?: string;
  consoleExporter: boolean;
}

export interface AppConfig {
  port: number;
  courseFile: string;
  corsOrigins: string[];
  telemetry: TelemetryConfig;
}

export const DEFAULT_COURSE_FILE = path.join(__dirname, "../data/course_catalog.json");
const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parsePort(value: string | undefined): number {
  if (value === undefined || value.trim() === "") {
    return 3001;
  }

  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid API_PORT: "${value}"`);
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const corsOrigins = env.CORS_ORIGINS
    ? env.CORS_ORIGINS.split(",").map(o => o.trim()).filter(Boolean)
    : DEFAULT_CORS_ORIGINS;

  return {
    port: parsePort(env.API_PORT),
    courseFile: env.COURSE_FILE ? path.resolve(env.COURSE_FILE) : DEFAULT_COURSE_FILE,
    corsOrigins,
    telemetry: {
      enabled: parseBoolean(env.TELEMETRY_ENABLED, true),
      serviceName: env.OTEL_SERVICE_NAME || "course_portal_service",
      otlpEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT || undefined,
      consoleExporter: parseBoolean(env.OTEL_CONSOLE_EXPORTER, false),
    },
  };
}
