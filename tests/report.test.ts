import { describe, it, expect } from "vitest";
import { buildQualityReport, fieldCompleteness } from "../src/report.ts";
import { makeRaw } from "./helpers/fixtures.ts";

describe("fieldCompleteness", () => {
  it("reports the share of records carrying each field", () => {
    const records = [makeRaw(), makeRaw({ job_state: null }), makeRaw({ job_state: "" })];
    const completeness = fieldCompleteness(records);
    expect(completeness.job_id).toBe(100);
    expect(completeness.job_state).toBe(33.3);
    expect(completeness.employer_logo).toBe(0);
  });

  it("returns zeros for an empty batch", () => {
    expect(fieldCompleteness([]).job_title).toBe(0);
  });
});

describe("buildQualityReport", () => {
  const startedAt = new Date("2024-03-01T12:00:00.000Z");
  const finishedAt = new Date("2024-03-01T12:00:02.500Z");

  it("aggregates decisions, reasons and load outcomes", () => {
    const report = buildQualityReport({
      records: [makeRaw(), makeRaw(), makeRaw(), makeRaw()],
      decisions: [
        { externalId: "a", index: 0, outcome: "accepted", reasons: [] },
        { externalId: "b", index: 1, outcome: "flagged", reasons: ["salary outlier", "insecure apply link"] },
        { externalId: "c", index: 2, outcome: "rejected", reasons: ["missing job_title"] },
        { externalId: "d", index: 3, outcome: "flagged", reasons: ["salary outlier"] },
      ],
      outcomes: [
        { externalId: "a", index: 0, status: "loaded", attempts: 1 },
        { externalId: "b", index: 1, status: "failed", attempts: 2, error: "value too long" },
        { externalId: "d", index: 3, status: "not_attempted", attempts: 0 },
      ],
      startedAt,
      finishedAt,
      aborted: true,
      uniqueCompanies: 1,
      uniqueSkills: 3,
    });

    expect(report.durationMs).toBe(2500);
    expect(report.totalRecords).toBe(4);
    expect(report.decisions).toEqual({ accepted: 1, flagged: 2, rejected: 1 });
    expect(report.load).toEqual({ loaded: 1, replaced: 0, duplicates: 0, failed: 1, notAttempted: 1 });
    expect(report.reasonCounts).toEqual({
      "salary outlier": 2,
      "insecure apply link": 1,
      "missing job_title": 1,
    });
    expect(report.rejected).toEqual([{ externalId: "c", reasons: ["missing job_title"] }]);
    expect(report.flaggedForReview.map((f) => f.externalId)).toEqual(["b", "d"]);
    expect(report.loadFailures).toEqual([{ externalId: "b", error: "value too long" }]);
    expect(report.notAttempted).toEqual(["d"]);
    expect(report.aborted).toBe(true);
  });

  it("counts batch duplicates as duplicate ids", () => {
    const report = buildQualityReport({
      records: [makeRaw(), makeRaw()],
      decisions: [],
      outcomes: [
        { externalId: "job-001", index: 0, status: "loaded", attempts: 1 },
        { externalId: "job-001", index: 1, status: "duplicate", attempts: 0 },
      ],
      startedAt,
      finishedAt,
      aborted: false,
      uniqueCompanies: 1,
      uniqueSkills: 0,
    });
    expect(report.duplicateIdCount).toBe(1);
  });
});
