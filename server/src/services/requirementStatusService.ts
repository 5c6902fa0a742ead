import type { ComplianceStatus, RequirementStatusUpdate } from "@shared/schema";
import type { IStorage, RequirementMappingPatch } from "../../storage";
import { NotFoundError } from "../../errors";

export interface StatusUpdateResult {
  mappingId: string;
  requirementId: string;
  article: string;
  title: string;
  oldStatus: ComplianceStatus;
  newStatus: ComplianceStatus;
  notes: string | null;
  updatedBy: string | null;
  updatedAt: Date;
}

/**
 * Set a tracking record's status. Any status may follow any other.
 *
 * `notes` and `updatedBy` are written only when present on `update`:
 * omitted keeps the stored value, `null` clears it.
 */
export async function updateStatus(
  storage: IStorage,
  mappingId: string,
  update: RequirementStatusUpdate,
): Promise<StatusUpdateResult> {
  const mapping = await storage.getRequirementMapping(mappingId);
  if (!mapping) {
    throw new NotFoundError("Requirement mapping not found", { mappingId });
  }

  const patch: RequirementMappingPatch = {
    status: update.status,
    updatedAt: new Date(),
  };
  if (update.notes !== undefined) patch.notes = update.notes;
  if (update.updatedBy !== undefined) patch.updatedBy = update.updatedBy;

  const updated = await storage.updateRequirementMapping(mappingId, patch);
  if (!updated) {
    // Deleted (with its system) between the read and the write
    throw new NotFoundError("Requirement mapping not found", { mappingId });
  }

  const requirement = await storage.getRequirement(updated.requirementId);
  if (!requirement) {
    throw new NotFoundError("Requirement not found", { requirementId: updated.requirementId });
  }

  return {
    mappingId: updated.id,
    requirementId: requirement.id,
    article: requirement.article,
    title: requirement.title,
    oldStatus: mapping.status,
    newStatus: updated.status,
    notes: updated.notes,
    updatedBy: updated.updatedBy,
    updatedAt: updated.updatedAt,
  };
}
