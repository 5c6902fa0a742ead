/**
 * System Registry - owns AI system records.
 *
 * Registration is the only multi-step write: the system row, the catalog
 * read and every tracking record share one transaction, so no reader ever
 * sees a system with a partial set of requirements.
 */

import type { AISystem, InsertAISystem, InsertEvidence, Evidence } from "@shared/schema";
import type { IStorage, SystemRequirementDetail } from "../../storage";
import { NotFoundError } from "../../errors";
import { resolveAndAssign } from "./applicabilityResolver";

export interface RegistrationResult {
  system: AISystem;
  requirementsAssigned: number;
}

export async function registerSystem(storage: IStorage, input: InsertAISystem): Promise<RegistrationResult> {
  const result = await storage.transaction(async (tx) => {
    const system = await tx.createSystem(input);
    const requirementsAssigned = await resolveAndAssign(tx, system);
    return { system, requirementsAssigned };
  });

  console.log(
    `[Registry] Created AI system '${result.system.name}' with ${result.requirementsAssigned} requirements assigned`,
  );
  return result;
}

export async function listSystems(storage: IStorage): Promise<AISystem[]> {
  return storage.getSystems();
}

export async function getSystem(storage: IStorage, id: string): Promise<AISystem> {
  const system = await storage.getSystem(id);
  if (!system) {
    throw new NotFoundError("AI system not found", { systemId: id });
  }
  return system;
}

export async function getSystemRequirements(storage: IStorage, systemId: string): Promise<SystemRequirementDetail[]> {
  await getSystem(storage, systemId);
  return storage.getSystemRequirementDetails(systemId);
}

export async function deleteSystem(storage: IStorage, id: string): Promise<void> {
  const deleted = await storage.deleteSystem(id);
  if (!deleted) {
    throw new NotFoundError("AI system not found", { systemId: id });
  }
  console.log(`[Registry] Deleted AI system ${id} with its tracking records and evidence`);
}

export async function listEvidence(storage: IStorage, systemId: string): Promise<Evidence[]> {
  await getSystem(storage, systemId);
  return storage.getEvidenceBySystem(systemId);
}

export async function attachEvidence(storage: IStorage, systemId: string, input: InsertEvidence): Promise<Evidence> {
  await getSystem(storage, systemId);

  if (input.requirementMappingId !== undefined && input.requirementMappingId !== null) {
    const mapping = await storage.getRequirementMapping(input.requirementMappingId);
    if (!mapping || mapping.aiSystemId !== systemId) {
      throw new NotFoundError("Requirement mapping not found for this AI system", {
        systemId,
        mappingId: input.requirementMappingId,
      });
    }
  }

  return storage.createEvidence({ ...input, aiSystemId: systemId });
}
