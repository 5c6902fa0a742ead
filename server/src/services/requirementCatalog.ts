/**
 * Requirement Catalog - the regulatory obligations an AI system can be held to.
 *
 * The catalog is reference data. It is written only by the seed script and
 * validated there, so readers can trust `appliesTo` as a set of RiskCategory.
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import { requirementSeedSchema, type ComplianceRequirement, type RequirementSeed } from "@shared/schema";
import type { IStorage } from "../../storage";
import { NotFoundError } from "../../errors";

export const DEFAULT_REQUIREMENT_SEED_PATH = fileURLToPath(
  new URL("../../data/eu-ai-act-requirements.json", import.meta.url),
);

const requirementCatalogSchema = z.array(requirementSeedSchema).superRefine((entries, ctx) => {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.article)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "article"],
        message: `duplicate article '${entry.article}'`,
      });
    }
    seen.add(entry.article);
  });
});

export async function listAll(storage: IStorage): Promise<ComplianceRequirement[]> {
  return storage.getRequirements();
}

export async function getRequirement(storage: IStorage, id: string): Promise<ComplianceRequirement> {
  const requirement = await storage.getRequirement(id);
  if (!requirement) {
    throw new NotFoundError("Requirement not found", { requirementId: id });
  }
  return requirement;
}

/** Throws a ZodError naming every offending entry. */
export function parseRequirementSeed(raw: unknown): RequirementSeed[] {
  return requirementCatalogSchema.parse(raw);
}

export function loadRequirementSeed(path: string = DEFAULT_REQUIREMENT_SEED_PATH): RequirementSeed[] {
  const content = readFileSync(path, "utf-8");
  return parseRequirementSeed(JSON.parse(content));
}
