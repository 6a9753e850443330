import express from "express";
import type { Server } from "http";
import type { Logger } from "./types.js";

export function createHealthApp(): express.Express {
  const app = express();
  app.get("*", (_req, res) => {
    res.type("text/plain").send("OK");
  });
  return app;
}

/** Liveness responder for hosting platforms; it knows nothing about the bot. */
export function startHealthServer(port: number, logger: Logger = console, host = "0.0.0.0"): Server {
  const server = createHealthApp().listen(port, host, () => {
    logger.info(`Health check server started on port ${port}`);
  });
  server.on("error", (error) => {
    logger.error(`Failed to start health check server on port ${port}: ${error.message}`);
  });
  return server;
}
