import dotenv from "dotenv";

import { createApp } from "./app";
import { loadConfig } from "../config";
import { CourseStore } from "../stores/courseStore";
import { createTelemetryFromConfig } from "../telemetry/telemetry";

dotenv.config();

const config = loadConfig();
const telemetry = createTelemetryFromConfig(config.telemetry);
const store = new CourseStore(config.courseFile);

const app = createApp({ store, telemetry, corsOrigins: config.corsOrigins });

// Start server
const server = app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
  console.log(`Course catalog file: ${config.courseFile}`);
});

function shutdown(signal: string) {
  console.log(`${signal} received, shutting down`);
  server.close(() => {
    telemetry
      .shutdown()
      .catch((error) => console.error("Error flushing telemetry:", error))
      .finally(() => process.exit(0));
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

export default app;
