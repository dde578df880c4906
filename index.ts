import express from "express";
import type { Application, NextFunction, Request, Response } from "express";
import path from "node:path";
import fs from "node:fs";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { loadConfig } from "./src/config/env";
import { QuestionAnswerer } from "./src/answer/answerer";
import { createDefaultRegistry } from "./src/data/registry";
import { init } from "./src/db";
import { describeError, logger } from "./src/logger";
import { createRouter } from "./src/routes";
import { AdaptiveSourceRanker } from "./src/selection/adaptive";
import { SourceStatisticsTracker } from "./src/stats/tracker";
import { AxiosProviderHttp } from "./src/utils";

const config = loadConfig();

const tracker = new SourceStatisticsTracker();
const ranker = new AdaptiveSourceRanker();
const answerer = new QuestionAnswerer({
  registry: createDefaultRegistry(config.credentials, new AxiosProviderHttp()),
  fanout: config.fanout,
  maxSentences: config.fusion.maxSentences,
  cache: config.cache,
  contextSize: config.contextSize,
  ranker,
  statistics: () => tracker.snapshot()
});
answerer.onOutcome((outcome) => tracker.recordCycle(outcome));

const app: Application = express();

app.use(helmet());
app.use(express.json({ limit: "1mb" }));

const swaggerPath = path.resolve(__dirname, "..", "swagger.json");
let swaggerDocument: Record<string, unknown> | null = null;

if (fs.existsSync(swaggerPath)) {
  try {
    swaggerDocument = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
  } catch (error) {
    logger.error("Failed to parse swagger.json", { error: describeError(error) });
  }
} else {
  logger.warn("Swagger definition not found, /docs route disabled", { swaggerPath });
}

if (swaggerDocument) {
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
}

app.get("/health", (_req: Request, res: Response) => {
  res.json({ status: "ok", uptime: process.uptime() });
});

app.use(createRouter({ answerer, tracker, ranker }));

app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  logger.error("Unhandled error", { error: describeError(err) });
  res.status(500).json({ message: "Unexpected server error" });
});

init()
  .then(() => logger.info("Answer log table ready"))
  .catch((error: unknown) => logger.warn("Answer log unavailable, answers will not be persisted", { error: describeError(error) }));

app.listen(config.port, () => {
  logger.info("Answer fusion service listening", { port: config.port });
});

process.on("unhandledRejection", (reason: unknown) => {
  logger.error("Unhandled promise rejection", { error: describeError(reason) });
});

process.on("SIGTERM", () => {
  logger.info("Received SIGTERM, shutting down.");
  process.exit(0);
});
