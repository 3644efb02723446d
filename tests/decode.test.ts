import { describe, it, expect } from "vitest";
import { decodeRecord, hasValue } from "../src/decode.ts";
import { makeRaw } from "./helpers/fixtures.ts";

describe("decodeRecord", () => {
  it("maps raw API fields to the decoded shape", () => {
    const record = decodeRecord(makeRaw());
    expect(record.externalId).toBe("job-001");
    expect(record.title).toBe("Data Analyst");
    expect(record.employerName).toBe("Acme Analytics");
    expect(record.isRemote).toBe(false);
    expect(record.postedAtTimestamp).toBe(1700000000);
    expect(record.latitude).toBe(30.27);
    expect(record.salaryPeriod).toBe("YEAR");
    expect(record.onetJobZone).toBe("4");
    expect(record.issues).toEqual([]);
  });

  it("treats empty and whitespace-only strings as absent", () => {
    const record = decodeRecord(makeRaw({ job_title: "   ", job_city: "" }));
    expect(record.title).toBeNull();
    expect(record.city).toBeNull();
    expect(record.issues).toEqual([]);
  });

  it("trims text fields", () => {
    expect(decodeRecord(makeRaw({ job_title: "  Data Analyst \n" })).title).toBe("Data Analyst");
  });

  it("stringifies numeric text fields", () => {
    expect(decodeRecord(makeRaw({ job_onet_job_zone: 4 })).onetJobZone).toBe("4");
  });

  it("records a numeric job_id as an issue", () => {
    const record = decodeRecord(makeRaw({ job_id: 12345 }));
    expect(record.externalId).toBeNull();
    expect(record.issues).toEqual([{ field: "job_id", value: 12345 }]);
  });

  it("parses numeric strings with currency symbols and separators", () => {
    const record = decodeRecord(makeRaw({ job_min_salary: "$60,000", job_max_salary: " 80000 " }));
    expect(record.minSalary).toBe(60000);
    expect(record.maxSalary).toBe(80000);
  });

  it("records unparseable numbers as issues", () => {
    const record = decodeRecord(makeRaw({ job_latitude: "north" }));
    expect(record.latitude).toBeNull();
    expect(record.issues).toEqual([{ field: "job_latitude", value: "north" }]);
  });

  it("accepts string and numeric booleans", () => {
    expect(decodeRecord(makeRaw({ job_is_remote: "TRUE" })).isRemote).toBe(true);
    expect(decodeRecord(makeRaw({ job_is_remote: "no" })).isRemote).toBe(false);
    expect(decodeRecord(makeRaw({ job_is_remote: 1 })).isRemote).toBe(true);
  });

  it("records an unrecognized boolean as an issue", () => {
    const record = decodeRecord(makeRaw({ job_is_remote: "sometimes" }));
    expect(record.isRemote).toBeNull();
    expect(record.issues.map((i) => i.field)).toEqual(["job_is_remote"]);
  });

  it("keeps only non-empty strings in benefit lists", () => {
    const record = decodeRecord(makeRaw({ job_benefits: ["dental", 3, " ", "vision "] }));
    expect(record.benefits).toEqual(["dental", "vision"]);
  });

  it("wraps a single benefit string in a list", () => {
    expect(decodeRecord(makeRaw({ job_benefits: "dental" })).benefits).toEqual(["dental"]);
  });

  it("decodes highlight blocks and ignores unknown block names", () => {
    const record = decodeRecord(
      makeRaw({
        job_highlights: {
          Qualifications: ["SQL", "", 7],
          Responsibilities: "Own the weekly report",
          Perks: ["Free lunch"],
        },
      })
    );
    expect(record.highlights).toEqual({
      Qualifications: ["SQL"],
      Responsibilities: ["Own the weekly report"],
    });
  });

  it("keeps an empty highlights object distinct from a missing one", () => {
    expect(decodeRecord(makeRaw({ job_highlights: {} })).highlights).toEqual({});
    expect(decodeRecord(makeRaw({ job_highlights: null })).highlights).toBeNull();
  });

  it("records a non-object highlights value as an issue", () => {
    const record = decodeRecord(makeRaw({ job_highlights: ["SQL"] }));
    expect(record.highlights).toBeNull();
    expect(record.issues.map((i) => i.field)).toEqual(["job_highlights"]);
  });
});

describe("hasValue", () => {
  it("is false for missing, blank, and empty collection values", () => {
    const raw = makeRaw({ job_city: "  ", job_benefits: [], job_highlights: {}, job_state: null });
    expect(hasValue(raw, "job_city")).toBe(false);
    expect(hasValue(raw, "job_benefits")).toBe(false);
    expect(hasValue(raw, "job_highlights")).toBe(false);
    expect(hasValue(raw, "job_state")).toBe(false);
    expect(hasValue(raw, "job_unknown")).toBe(false);
  });

  it("is true for populated values including false and zero", () => {
    const raw = makeRaw({ job_is_remote: false, job_latitude: 0 });
    expect(hasValue(raw, "job_is_remote")).toBe(true);
    expect(hasValue(raw, "job_latitude")).toBe(true);
    expect(hasValue(raw, "job_title")).toBe(true);
  });
});
