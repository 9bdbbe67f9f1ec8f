import cors from "cors";
import dotenv from "dotenv";
import express from "express";
import morgan from "morgan";
import path from "node:path";
import healthRoutes from "./routes/health.routes";
import { createMetricsRouter } from "./routes/metrics.routes";
import { errorHandler } from "./middleware/httpError";
import type { MetricsSettings } from "./models/_types";
import { loadSettingsFromEnv } from "./utils/settings";

dotenv.config({ path: path.resolve(__dirname, "../.env") });

export function createApp(settings: MetricsSettings = loadSettingsFromEnv()) {
  const app = express();
  app.use(cors({ origin: process.env.CLIENT_ORIGIN || "http://localhost:3000" }));
  app.use(express.json({ limit: "5mb" }));
  if (process.env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }

  app.use("/api", healthRoutes);
  app.use("/api/metrics", createMetricsRouter(settings));

  app.use(errorHandler);

  return app;
}

export const app = createApp();

if (require.main === module) {
  const port = Number(process.env.SERVER_PORT) || 4000;
  app.listen(port, () => {
    console.log(`[Metrics] API ready on http://localhost:${port}`);
  });
}
