// src/web.ts
// Веб-процесс для хостинга: отвечает на health-check. createWebApp без listen — для тестов.
import express, { type Application, type Request, type Response } from "express";
import type { Server } from "http";
import { ConfigError, loadWebConfig } from "./config";
import { ErrorHandler } from "./lib/errorHandler";
import { logger, toError } from "./lib/logger";

export const ALIVE_TEXT = "Secret Share Bot is alive";

export function createWebApp(uptime: () => number = process.uptime): Application {
  const app = express();
  app.disable("x-powered-by");

  app.get("/", (_req: Request, res: Response) => {
    res.type("text/plain").send(ALIVE_TEXT);
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", uptime: Math.floor(uptime()) });
  });

  return app;
}

export function startWeb(port: number): Server {
  return createWebApp().listen(port, () => {
    logger.info(`Web server listening on port ${port}`, { action: "web_start", port });
  });
}

if (require.main === module) {
  try {
    const { port } = loadWebConfig();
    const server = startWeb(port);
    ErrorHandler.registerShutdown(
      () => new Promise<void>((resolve, reject) => server.close(e => (e ? reject(e) : resolve())))
    );
  } catch (error) {
    const problems = error instanceof ConfigError ? error.problems : undefined;
    logger.error("Web server failed to start", { action: "web_start_failed", problems, error: toError(error) });
    process.exit(1);
  }
}
