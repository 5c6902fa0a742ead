import { sql, relations } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============== ENUMS ==============
// EU AI Act risk tiers (Article 6 / Annex III)
export const riskCategoryEnum = ["unacceptable", "high", "limited", "minimal"] as const;
export type RiskCategory = typeof riskCategoryEnum[number];

export const complianceStatusEnum = ["not_started", "in_progress", "completed", "non_compliant"] as const;
export type ComplianceStatus = typeof complianceStatusEnum[number];

// ============== AI SYSTEMS ==============
export const aiSystems = pgTable("ai_systems", {
  id: varchar("id", { length: 36 }).primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 255 }).notNull(),
  description: text("description"),
  riskCategory: text("risk_category", { enum: riskCategoryEnum }).notNull(),
  organization: varchar("organization", { length: 255 }),
  department: varchar("department", { length: 255 }),
  ownerEmail: varchar("owner_email", { length: 255 }),
  createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamp("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export const aiSystemsRelations = relations(aiSystems, ({ many }) => ({
  requirementMappings: many(requirementMappings),
  evidence: many(evidence),
}));

export const insertAiSystemSchema = createInsertSchema(aiSystems, {
  name: (schema) => schema.min(1).max(255),
}).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export type AISystem = typeof aiSystems.$inferSelect;
export type InsertAISystem = z.infer<typeof insertAiSystemSchema>;

// ============== COMPLIANCE REQUIREMENTS ==============
// Reference data: populated by the seed script, read-only at runtime.
export const complianceRequirements = pgTable("compliance_requirements", {
  id: varchar("id", { length: 36 }).primaryKey().default(sql`gen_random_uuid()`),
  article: varchar("article", { length: 50 }).notNull().unique(), // e.g. "Article 9"
  title: varchar("title", { length: 255 }).notNull(),
  description: text("description").notNull(),
  appliesTo: text("applies_to").array().notNull().$type<RiskCategory[]>(),
});

export const complianceRequirementsRelations = relations(complianceRequirements, ({ many }) => ({
  mappings: many(requirementMappings),
}));

export const requirementSeedSchema = z.object({
  article: z.string().min(1).max(50),
  title: z.string().min(1).max(255),
  description: z.string().min(1),
  appliesTo: z
    .array(z.enum(riskCategoryEnum))
    .nonempty("applicability set must name at least one risk category")
    .refine((categories) => new Set(categories).size === categories.length, {
      message: "applicability set lists a risk category twice",
    }),
});

export type ComplianceRequirement = typeof complianceRequirements.$inferSelect;
export type RequirementSeed = z.infer<typeof requirementSeedSchema>;

// ============== REQUIREMENT MAPPINGS ==============
// One tracking record per (AI system, requirement) pair.
export const requirementMappings = pgTable(
  "requirement_mappings",
  {
    id: varchar("id", { length: 36 }).primaryKey().default(sql`gen_random_uuid()`),
    aiSystemId: varchar("ai_system_id", { length: 36 })
      .notNull()
      .references(() => aiSystems.id, { onDelete: "cascade" }),
    requirementId: varchar("requirement_id", { length: 36 })
      .notNull()
      .references(() => complianceRequirements.id, { onDelete: "cascade" }),
    status: text("status", { enum: complianceStatusEnum }).notNull().default("not_started"),
    notes: text("notes"),
    updatedBy: varchar("updated_by", { length: 255 }),
    createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
    updatedAt: timestamp("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => [
    uniqueIndex("requirement_mappings_system_requirement_idx").on(table.aiSystemId, table.requirementId),
  ],
);

export const requirementMappingsRelations = relations(requirementMappings, ({ one, many }) => ({
  aiSystem: one(aiSystems, {
    fields: [requirementMappings.aiSystemId],
    references: [aiSystems.id],
  }),
  requirement: one(complianceRequirements, {
    fields: [requirementMappings.requirementId],
    references: [complianceRequirements.id],
  }),
  evidence: many(evidence),
}));

// notes/updatedBy: absent leaves the stored value, null clears it
export const requirementStatusUpdateSchema = z.object({
  status: z.enum(complianceStatusEnum),
  notes: z.string().nullable().optional(),
  updatedBy: z.string().max(255).nullable().optional(),
});

export type RequirementMapping = typeof requirementMappings.$inferSelect;
export type InsertRequirementMapping = typeof requirementMappings.$inferInsert;
export type RequirementStatusUpdate = z.infer<typeof requirementStatusUpdateSchema>;

// ============== EVIDENCE ==============
export const evidence = pgTable("evidence", {
  id: varchar("id", { length: 36 }).primaryKey().default(sql`gen_random_uuid()`),
  aiSystemId: varchar("ai_system_id", { length: 36 })
    .notNull()
    .references(() => aiSystems.id, { onDelete: "cascade" }),
  requirementMappingId: varchar("requirement_mapping_id", { length: 36 })
    .references(() => requirementMappings.id, { onDelete: "cascade" }),
  title: varchar("title", { length: 255 }).notNull(),
  description: text("description"),
  fileUrl: varchar("file_url", { length: 500 }), // external blob reference
  createdAt: timestamp("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export const evidenceRelations = relations(evidence, ({ one }) => ({
  aiSystem: one(aiSystems, {
    fields: [evidence.aiSystemId],
    references: [aiSystems.id],
  }),
  requirementMapping: one(requirementMappings, {
    fields: [evidence.requirementMappingId],
    references: [requirementMappings.id],
  }),
}));

export const insertEvidenceSchema = createInsertSchema(evidence, {
  title: (schema) => schema.min(1),
}).omit({
  id: true,
  aiSystemId: true,
  createdAt: true,
});

export type Evidence = typeof evidence.$inferSelect;
export type InsertEvidence = z.infer<typeof insertEvidenceSchema>;
