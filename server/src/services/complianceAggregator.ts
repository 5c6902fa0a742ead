/**
 * Compliance Aggregator - turns a system's tracking records into a posture
 * snapshot. Read-only.
 */

import type { ComplianceStatus, RiskCategory } from "@shared/schema";
import type { IStorage } from "../../storage";
import { NotFoundError } from "../../errors";

export type StatusBreakdown = Record<ComplianceStatus, number>;

export interface StatusSummary {
  totalRequirements: number;
  compliancePercentage: number;
  statusBreakdown: StatusBreakdown;
  requirementsCompleted: number;
  requirementsInProgress: number;
  requirementsNotStarted: number;
  requirementsNonCompliant: number;
}

export interface ComplianceSummary extends StatusSummary {
  systemId: string;
  systemName: string;
  riskCategory: RiskCategory;
}

export function emptyBreakdown(): StatusBreakdown {
  return {
    not_started: 0,
    in_progress: 0,
    completed: 0,
    non_compliant: 0,
  };
}

export function roundPercentage(value: number): number {
  return Math.round(value * 100) / 100;
}

export function summarizeStatuses(statuses: ComplianceStatus[]): StatusSummary {
  const breakdown = emptyBreakdown();
  for (const status of statuses) {
    breakdown[status] += 1;
  }

  const total = statuses.length;
  // A system with no applicable requirements is 0%, not an error
  const compliancePercentage = total === 0 ? 0 : roundPercentage((breakdown.completed / total) * 100);

  return {
    totalRequirements: total,
    compliancePercentage,
    statusBreakdown: breakdown,
    requirementsCompleted: breakdown.completed,
    requirementsInProgress: breakdown.in_progress,
    requirementsNotStarted: breakdown.not_started,
    requirementsNonCompliant: breakdown.non_compliant,
  };
}

export async function summarize(storage: IStorage, systemId: string): Promise<ComplianceSummary> {
  const system = await storage.getSystem(systemId);
  if (!system) {
    throw new NotFoundError("AI system not found", { systemId });
  }

  const mappings = await storage.getRequirementMappingsBySystem(systemId);

  return {
    systemId: system.id,
    systemName: system.name,
    riskCategory: system.riskCategory,
    ...summarizeStatuses(mappings.map((mapping) => mapping.status)),
  };
}
