import type { Express, Response } from "express";
import type { Server } from "http";
import {
  insertAiSystemSchema,
  insertEvidenceSchema,
  requirementStatusUpdateSchema,
} from "@shared/schema";
import type { IStorage } from "./storage";
import { isDatabaseConnectionError } from "./db";
import { NotFoundError, errorMessage } from "./errors";
import { log } from "./logger";
import { listAll, getRequirement } from "./src/services/requirementCatalog";
import { summarize } from "./src/services/complianceAggregator";
import { updateStatus } from "./src/services/requirementStatusService";
import {
  registerSystem,
  listSystems,
  getSystem,
  getSystemRequirements,
  deleteSystem,
  listEvidence,
  attachEvidence,
} from "./src/services/systemRegistry";

export const SERVICE_NAME = "AI Compliance Registry";
export const SERVICE_VERSION = "1.0.0";

function sendError(res: Response, error: unknown, fallback: string) {
  if (error instanceof NotFoundError) {
    return res.status(404).json({ error: error.message });
  }
  if (isDatabaseConnectionError(error)) {
    return res.status(503).json({
      error: "Database unavailable",
      code: "DATABASE_UNAVAILABLE",
    });
  }
  console.error(`[Routes] ${fallback}:`, errorMessage(error));
  return res.status(500).json({ error: fallback });
}

export async function registerRoutes(httpServer: Server, app: Express, storage: IStorage): Promise<Server> {
  app.get("/", (_req, res) => {
    res.json({
      message: `${SERVICE_NAME} - continuous AI Act compliance tracking`,
      version: SERVICE_VERSION,
      status: "running",
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/health", async (_req, res) => {
    const databaseOk = await storage.ping();
    res.status(databaseOk ? 200 : 503).json({
      status: databaseOk ? "healthy" : "degraded",
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      services: { database: databaseOk },
    });
  });

  app.get("/version", (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      environment: process.env.NODE_ENV || "development",
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // AI SYSTEMS
  // ═══════════════════════════════════════════════════════════════════════════

  app.post("/api/systems", async (req, res) => {
    try {
      const parsed = insertAiSystemSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.errors });
      }
      const { system } = await registerSystem(storage, parsed.data);
      res.status(201).json(system);
    } catch (error) {
      sendError(res, error, "Failed to register AI system");
    }
  });

  app.get("/api/systems", async (_req, res) => {
    try {
      res.json(await listSystems(storage));
    } catch (error) {
      sendError(res, error, "Failed to fetch AI systems");
    }
  });

  app.get("/api/systems/:id", async (req, res) => {
    try {
      res.json(await getSystem(storage, req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch AI system");
    }
  });

  app.delete("/api/systems/:id", async (req, res) => {
    try {
      await deleteSystem(storage, req.params.id);
      res.status(204).send();
    } catch (error) {
      sendError(res, error, "Failed to delete AI system");
    }
  });

  app.get("/api/systems/:id/requirements", async (req, res) => {
    try {
      res.json(await getSystemRequirements(storage, req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch system requirements");
    }
  });

  app.get("/api/systems/:id/compliance", async (req, res) => {
    try {
      res.json(await summarize(storage, req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to compute compliance summary");
    }
  });

  app.get("/api/systems/:id/evidence", async (req, res) => {
    try {
      res.json(await listEvidence(storage, req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch evidence");
    }
  });

  app.post("/api/systems/:id/evidence", async (req, res) => {
    try {
      const parsed = insertEvidenceSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.errors });
      }
      const created = await attachEvidence(storage, req.params.id, parsed.data);
      res.status(201).json(created);
    } catch (error) {
      sendError(res, error, "Failed to attach evidence");
    }
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // REQUIREMENTS
  // ═══════════════════════════════════════════════════════════════════════════

  app.get("/api/requirements", async (_req, res) => {
    try {
      res.json(await listAll(storage));
    } catch (error) {
      sendError(res, error, "Failed to fetch requirements");
    }
  });

  app.get("/api/requirements/:id", async (req, res) => {
    try {
      res.json(await getRequirement(storage, req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch requirement");
    }
  });

  app.put("/api/requirements/:mappingId", async (req, res) => {
    try {
      const parsed = requirementStatusUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.errors });
      }
      const result = await updateStatus(storage, req.params.mappingId, parsed.data);
      log(`Requirement '${result.title}' status changed: ${result.oldStatus} → ${result.newStatus}`, "compliance");
      res.json(result);
    } catch (error) {
      sendError(res, error, "Failed to update requirement status");
    }
  });

  return httpServer;
}
