import { describe, it, expect, beforeEach } from "vitest";
import { NotFoundError } from "../../errors";
import { createSeededStorage, systemInput } from "../testing/fixtures";
import type { MemStorage } from "../testing/memStorage";
import { summarize, summarizeStatuses, roundPercentage } from "./complianceAggregator";
import { registerSystem } from "./systemRegistry";
import { updateStatus } from "./requirementStatusService";

describe("Compliance Aggregator", () => {
  describe("summarizeStatuses", () => {
    it("counts every status and computes the completion percentage", () => {
      expect(summarizeStatuses(["completed", "completed", "in_progress", "not_started"])).toEqual({
        totalRequirements: 4,
        compliancePercentage: 50,
        statusBreakdown: {
          not_started: 1,
          in_progress: 1,
          completed: 2,
          non_compliant: 0,
        },
        requirementsCompleted: 2,
        requirementsInProgress: 1,
        requirementsNotStarted: 1,
        requirementsNonCompliant: 0,
      });
    });

    it("returns a zero-filled breakdown when there are no records", () => {
      expect(summarizeStatuses([])).toEqual({
        totalRequirements: 0,
        compliancePercentage: 0,
        statusBreakdown: {
          not_started: 0,
          in_progress: 0,
          completed: 0,
          non_compliant: 0,
        },
        requirementsCompleted: 0,
        requirementsInProgress: 0,
        requirementsNotStarted: 0,
        requirementsNonCompliant: 0,
      });
    });

    it("rounds the percentage to two decimals", () => {
      expect(summarizeStatuses(["completed", "not_started", "not_started"]).compliancePercentage).toBe(33.33);
      expect(summarizeStatuses(["completed", "completed", "non_compliant"]).compliancePercentage).toBe(66.67);
      expect(summarizeStatuses(["completed"]).compliancePercentage).toBe(100);
    });

    it("leaves whole percentages untouched", () => {
      expect(roundPercentage(25)).toBe(25);
      expect(roundPercentage(12.5)).toBe(12.5);
    });
  });

  describe("summarize", () => {
    let storage: MemStorage;

    beforeEach(() => {
      storage = createSeededStorage();
    });

    it("summarizes a system's tracking records", async () => {
      const { system } = await registerSystem(storage, systemInput({ riskCategory: "high" }));
      const [first, second] = await storage.getRequirementMappingsBySystem(system.id);
      await updateStatus(storage, first.id, { status: "completed" });
      await updateStatus(storage, second.id, { status: "non_compliant" });

      const summary = await summarize(storage, system.id);

      expect(summary).toEqual({
        systemId: system.id,
        systemName: "Resume Screening Assistant",
        riskCategory: "high",
        totalRequirements: 3,
        compliancePercentage: 33.33,
        statusBreakdown: {
          not_started: 1,
          in_progress: 0,
          completed: 1,
          non_compliant: 1,
        },
        requirementsCompleted: 1,
        requirementsInProgress: 0,
        requirementsNotStarted: 1,
        requirementsNonCompliant: 1,
      });
    });

    it("reports 0% with a present, zeroed breakdown when nothing applies", async () => {
      const { system } = await registerSystem(storage, systemInput({ name: "Spam Filter", riskCategory: "minimal" }));

      const summary = await summarize(storage, system.id);

      expect(summary.totalRequirements).toBe(0);
      expect(summary.compliancePercentage).toBe(0);
      expect(summary.statusBreakdown).toEqual({
        not_started: 0,
        in_progress: 0,
        completed: 0,
        non_compliant: 0,
      });
      expect(summary.systemName).toBe("Spam Filter");
      expect(summary.riskCategory).toBe("minimal");
    });

    it("does not modify any record", async () => {
      const { system } = await registerSystem(storage, systemInput());
      const before = await storage.getRequirementMappingsBySystem(system.id);

      await summarize(storage, system.id);
      await summarize(storage, system.id);

      expect(await storage.getRequirementMappingsBySystem(system.id)).toEqual(before);
    });

    it("signals not found for an unknown system", async () => {
      await expect(summarize(storage, "00000000-0000-0000-0000-000000000000")).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });
});
