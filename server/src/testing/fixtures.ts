import type { InsertAISystem, RequirementSeed } from "@shared/schema";
import { MemStorage } from "./memStorage";

// Nothing applies to "minimal" here, which exercises the zero-requirement path.
export const TEST_CATALOG: RequirementSeed[] = [
  {
    article: "Article 5",
    title: "Prohibited Practices",
    description: "Test requirement for prohibited systems.",
    appliesTo: ["unacceptable"],
  },
  {
    article: "Article 9",
    title: "Risk Management System",
    description: "Test requirement for high-risk systems.",
    appliesTo: ["high"],
  },
  {
    article: "Article 14",
    title: "Human Oversight",
    description: "Test requirement for high-risk systems.",
    appliesTo: ["high"],
  },
  {
    article: "Article 50",
    title: "Transparency Obligations",
    description: "Test requirement shared by high and limited risk systems.",
    appliesTo: ["high", "limited"],
  },
];

export function createSeededStorage(): MemStorage {
  const storage = new MemStorage();
  storage.seedRequirements(TEST_CATALOG);
  return storage;
}

export function systemInput(overrides: Partial<InsertAISystem> = {}): InsertAISystem {
  return {
    name: "Resume Screening Assistant",
    description: "Ranks job applications for recruiters",
    riskCategory: "high",
    organization: "Example Corp",
    department: "HR",
    ownerEmail: "owner@example.com",
    ...overrides,
  };
}
