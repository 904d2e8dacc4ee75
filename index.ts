import express from "express";
import type { Application, Request, Response, NextFunction } from "express";
import helmet from "helmet";
import { createRoutes } from "./src/routes";
import { entrezClientOptions, loadConfig } from "./src/config/entrez";
import { EntrezClient } from "./src/entrez/client";

const config = loadConfig();
const client = new EntrezClient(entrezClientOptions(config));

const app: Application = express();

app.use(helmet());
app.use(express.json({ limit: "1mb" }));

app.get("/health", (_req: Request, res: Response) => {
  res.json({ status: "ok", uptime: process.uptime() });
});

app.use(createRoutes({ client, concurrency: config.RESOLVE_CONCURRENCY }));

// Basic error handler for uncaught errors within the request pipeline.
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  console.error("Unhandled error", err);
  res.status(500).json({ message: "Unexpected server error" });
});

app.listen(config.PORT, () => {
  console.log(`Gene resolver listening on port ${config.PORT}`);
});

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

process.on("SIGTERM", () => {
  console.log("Received SIGTERM, shutting down.");
  process.exit(0);
});
