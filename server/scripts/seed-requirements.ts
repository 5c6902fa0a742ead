/**
 * Requirement Catalog Seed Script
 *
 * Loads server/data/eu-ai-act-requirements.json, validates every entry and
 * inserts the ones whose article is not in compliance_requirements yet.
 * Safe to run repeatedly. Create the schema first with `npm run db:push`.
 *
 * Usage: npm run db:seed [-- path/to/catalog.json]
 */

import { complianceRequirements } from "@shared/schema";
import { loadConfig } from "../config";
import { createDatabase } from "../db";
import { loadRequirementSeed } from "../src/services/requirementCatalog";

async function main() {
  const config = loadConfig();
  const seedPath = process.argv[2];
  const entries = seedPath ? loadRequirementSeed(seedPath) : loadRequirementSeed();

  console.log(`[Catalog Seed] Inserting ${entries.length} entries...`);

  const database = createDatabase(config.databaseUrl);
  try {
    const inserted = await database.db
      .insert(complianceRequirements)
      .values(entries)
      .onConflictDoNothing({ target: complianceRequirements.article })
      .returning({ article: complianceRequirements.article });

    for (const row of inserted) {
      console.log(`  - ${row.article}`);
    }
    console.log(`[Catalog Seed] Inserted ${inserted.length} requirements, ${entries.length - inserted.length} already existed`);
  } finally {
    await database.close();
  }
}

main().catch((error) => {
  console.error("[Catalog Seed] Seed failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
