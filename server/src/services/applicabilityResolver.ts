import type { AISystem, ComplianceRequirement, InsertRequirementMapping, RiskCategory } from "@shared/schema";
import type { IStorage } from "../../storage";
import { listAll } from "./requirementCatalog";

export function selectApplicableRequirements(
  catalog: ComplianceRequirement[],
  riskCategory: RiskCategory,
): ComplianceRequirement[] {
  return catalog.filter((requirement) => requirement.appliesTo.includes(riskCategory));
}

/**
 * Attach one `not_started` tracking record per applicable requirement.
 *
 * Pass the transactional storage of the registration so the system and its
 * records commit together. Pairs that already exist are skipped, so calling
 * this twice for one system never duplicates a record.
 *
 * @returns the number of tracking records created
 */
export async function resolveAndAssign(storage: IStorage, system: AISystem): Promise<number> {
  const catalog = await listAll(storage);
  const applicable = selectApplicableRequirements(catalog, system.riskCategory);

  const created = await storage.createRequirementMappings(
    applicable.map((requirement): InsertRequirementMapping => ({
      aiSystemId: system.id,
      requirementId: requirement.id,
      status: "not_started",
    })),
  );

  console.log(
    `[Applicability] ${applicable.length}/${catalog.length} requirements apply to '${system.name}' (${system.riskCategory}), ${created.length} assigned`,
  );

  return created.length;
}
