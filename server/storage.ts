import {
  type AISystem, type InsertAISystem,
  type ComplianceRequirement,
  type RequirementMapping, type InsertRequirementMapping,
  type ComplianceStatus,
  type Evidence,
  aiSystems,
  complianceRequirements,
  requirementMappings,
  evidence,
} from "@shared/schema";
import type * as schema from "@shared/schema";
import { asc, desc, eq, sql } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";

/** A tracking record joined with the requirement it tracks, for display. */
export interface SystemRequirementDetail {
  mappingId: string;
  requirementId: string;
  article: string;
  title: string;
  description: string;
  status: ComplianceStatus;
  notes: string | null;
  updatedBy: string | null;
  updatedAt: Date;
}

export interface RequirementMappingPatch {
  status: ComplianceStatus;
  notes?: string | null;
  updatedBy?: string | null;
  updatedAt: Date;
}

export interface NewEvidence {
  aiSystemId: string;
  requirementMappingId?: string | null;
  title: string;
  description?: string | null;
  fileUrl?: string | null;
}

export interface IStorage {
  /** Run `work` against a storage whose writes commit together or not at all. */
  transaction<T>(work: (tx: IStorage) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;

  getSystems(): Promise<AISystem[]>;
  getSystem(id: string): Promise<AISystem | undefined>;
  createSystem(system: InsertAISystem): Promise<AISystem>;
  deleteSystem(id: string): Promise<boolean>;

  getRequirements(): Promise<ComplianceRequirement[]>;
  getRequirement(id: string): Promise<ComplianceRequirement | undefined>;

  getRequirementMapping(id: string): Promise<RequirementMapping | undefined>;
  getRequirementMappingsBySystem(systemId: string): Promise<RequirementMapping[]>;
  getSystemRequirementDetails(systemId: string): Promise<SystemRequirementDetail[]>;
  /** Inserts that hit an existing (system, requirement) pair are skipped and not returned. */
  createRequirementMappings(mappings: InsertRequirementMapping[]): Promise<RequirementMapping[]>;
  updateRequirementMapping(id: string, patch: RequirementMappingPatch): Promise<RequirementMapping | undefined>;

  getEvidenceBySystem(systemId: string): Promise<Evidence[]>;
  createEvidence(entry: NewEvidence): Promise<Evidence>;
}

// Either the root handle or an open transaction, on any postgres driver
type Executor = PgDatabase<PgQueryResultHKT, typeof schema>;

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Executor) {}

  async transaction<T>(work: (tx: IStorage) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => work(new DatabaseStorage(tx)));
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.execute(sql`SELECT 1`);
      return true;
    } catch (error) {
      console.warn("[Storage] Health check failed:", error instanceof Error ? error.message : error);
      return false;
    }
  }

  async getSystems(): Promise<AISystem[]> {
    return this.db.select().from(aiSystems).orderBy(desc(aiSystems.createdAt), desc(aiSystems.id));
  }

  async getSystem(id: string): Promise<AISystem | undefined> {
    const [system] = await this.db.select().from(aiSystems).where(eq(aiSystems.id, id));
    return system;
  }

  async createSystem(system: InsertAISystem): Promise<AISystem> {
    const [newSystem] = await this.db.insert(aiSystems).values(system).returning();
    return newSystem;
  }

  async deleteSystem(id: string): Promise<boolean> {
    // requirement_mappings and evidence go with it via ON DELETE CASCADE
    const result = await this.db.delete(aiSystems).where(eq(aiSystems.id, id)).returning();
    return result.length > 0;
  }

  async getRequirements(): Promise<ComplianceRequirement[]> {
    return this.db.select().from(complianceRequirements).orderBy(asc(complianceRequirements.article));
  }

  async getRequirement(id: string): Promise<ComplianceRequirement | undefined> {
    const [requirement] = await this.db
      .select()
      .from(complianceRequirements)
      .where(eq(complianceRequirements.id, id));
    return requirement;
  }

  async getRequirementMapping(id: string): Promise<RequirementMapping | undefined> {
    const [mapping] = await this.db.select().from(requirementMappings).where(eq(requirementMappings.id, id));
    return mapping;
  }

  async getRequirementMappingsBySystem(systemId: string): Promise<RequirementMapping[]> {
    return this.db
      .select()
      .from(requirementMappings)
      .where(eq(requirementMappings.aiSystemId, systemId))
      .orderBy(asc(requirementMappings.createdAt), asc(requirementMappings.id));
  }

  async getSystemRequirementDetails(systemId: string): Promise<SystemRequirementDetail[]> {
    return this.db
      .select({
        mappingId: requirementMappings.id,
        requirementId: complianceRequirements.id,
        article: complianceRequirements.article,
        title: complianceRequirements.title,
        description: complianceRequirements.description,
        status: requirementMappings.status,
        notes: requirementMappings.notes,
        updatedBy: requirementMappings.updatedBy,
        updatedAt: requirementMappings.updatedAt,
      })
      .from(requirementMappings)
      .innerJoin(complianceRequirements, eq(requirementMappings.requirementId, complianceRequirements.id))
      .where(eq(requirementMappings.aiSystemId, systemId))
      .orderBy(asc(complianceRequirements.article));
  }

  async createRequirementMappings(mappings: InsertRequirementMapping[]): Promise<RequirementMapping[]> {
    if (mappings.length === 0) return [];
    return this.db
      .insert(requirementMappings)
      .values(mappings)
      .onConflictDoNothing({ target: [requirementMappings.aiSystemId, requirementMappings.requirementId] })
      .returning();
  }

  async updateRequirementMapping(id: string, patch: RequirementMappingPatch): Promise<RequirementMapping | undefined> {
    const [updated] = await this.db
      .update(requirementMappings)
      .set(patch)
      .where(eq(requirementMappings.id, id))
      .returning();
    return updated;
  }

  async getEvidenceBySystem(systemId: string): Promise<Evidence[]> {
    return this.db
      .select()
      .from(evidence)
      .where(eq(evidence.aiSystemId, systemId))
      .orderBy(desc(evidence.createdAt), desc(evidence.id));
  }

  async createEvidence(entry: NewEvidence): Promise<Evidence> {
    const [newEvidence] = await this.db.insert(evidence).values(entry).returning();
    return newEvidence;
  }
}
