import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { createServer, type Server } from "http";
import type { IStorage } from "./storage";
import { registerRoutes } from "./routes";
import { errorStatus, errorMessage } from "./errors";
import { log } from "./logger";

const MAX_LOG_LINE = 160;

export async function createApp(storage: IStorage): Promise<{ app: Express; httpServer: Server }> {
  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }
        if (logLine.length > MAX_LOG_LINE) {
          logLine = logLine.slice(0, MAX_LOG_LINE - 1) + "…";
        }
        log(logLine);
      }
    });

    next();
  });

  await registerRoutes(httpServer, app, storage);

  // Anything a handler did not answer itself, e.g. a malformed JSON body
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    if (status >= 500) {
      console.error("[Express] Unhandled error:", err);
    }
    res.status(status).json({ error: status >= 500 ? "Internal Server Error" : errorMessage(err) });
  });

  return { app, httpServer };
}
