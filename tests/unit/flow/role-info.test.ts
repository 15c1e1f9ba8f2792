import {
  formatCollectedSlots,
  isDifferentJob,
  isRoleInfoComplete,
  mergeRoleInfo,
  missingSlots,
} from "@/lib/flow/role-info";
import { buildRoleInfo } from "../../helpers/conversation";

const FULL = buildRoleInfo({ jobRole: "Data Engineer", location: "NYC", companyName: "J&J" });

describe("mergeRoleInfo", () => {
  it("keeps existing values when incoming slots are null", () => {
    const merged = mergeRoleInfo(FULL, buildRoleInfo(), false);

    expect(merged).toEqual(FULL);
  });

  it("fills unknown slots and overrides known ones with new values", () => {
    const existing = buildRoleInfo({ jobRole: "Data Engineer" });
    const incoming = buildRoleInfo({ jobRole: "Senior Data Engineer", location: "Remote" });

    expect(mergeRoleInfo(existing, incoming, false)).toEqual({
      jobRole: "Senior Data Engineer",
      location: "Remote",
      companyName: null,
    });
  });

  it("treats blank incoming strings as not mentioned", () => {
    const merged = mergeRoleInfo(FULL, buildRoleInfo({ jobRole: "   ", location: "" }), false);

    expect(merged.jobRole).toBe("Data Engineer");
    expect(merged.location).toBe("NYC");
  });

  it("trims incoming values", () => {
    const merged = mergeRoleInfo(buildRoleInfo(), buildRoleInfo({ companyName: "  Google " }), false);

    expect(merged.companyName).toBe("Google");
  });

  it("is idempotent when the same update is applied twice", () => {
    const pairs = [
      [buildRoleInfo(), FULL],
      [FULL, buildRoleInfo({ location: "Boston" })],
      [buildRoleInfo({ jobRole: "PM" }), buildRoleInfo({ companyName: "Google" })],
      [FULL, buildRoleInfo()],
    ] as const;

    for (const [a, b] of pairs) {
      const once = mergeRoleInfo(a, b, false);
      expect(mergeRoleInfo(once, b, false)).toEqual(once);
    }
  });

  it("never downgrades a known job role to null", () => {
    const existing = buildRoleInfo({ jobRole: "Product Manager", location: "Paris" });

    const merged = mergeRoleInfo(existing, buildRoleInfo({ location: "Berlin" }), false);

    expect(merged.jobRole).toBe("Product Manager");
  });

  it("replaces everything on reset, including with nulls", () => {
    const incoming = buildRoleInfo({ jobRole: "Product Manager", companyName: "Google" });

    const merged = mergeRoleInfo(FULL, incoming, true);

    expect(merged).toEqual(incoming);
    expect(merged).not.toBe(incoming);
  });
});

describe("slot helpers", () => {
  it("reports completeness", () => {
    expect(isRoleInfoComplete(FULL)).toBe(true);
    expect(isRoleInfoComplete(buildRoleInfo({ jobRole: "PM", location: "NYC" }))).toBe(false);
  });

  it("lists missing slots in order", () => {
    expect(missingSlots(buildRoleInfo({ location: "NYC" }))).toEqual(["jobRole", "companyName"]);
    expect(missingSlots(FULL)).toEqual([]);
  });

  it("labels unknown slots explicitly", () => {
    expect(formatCollectedSlots(buildRoleInfo({ jobRole: "Data Engineer" }))).toBe(
      [
        "- job_role: Data Engineer",
        "- location: Not yet collected",
        "- company_name: Not yet collected",
      ].join("\n")
    );
  });
});

describe("isDifferentJob", () => {
  it("is false for an exact match", () => {
    expect(isDifferentJob(FULL, FULL)).toBe(false);
  });

  it("ignores case, spacing and punctuation near-misses", () => {
    expect(
      isDifferentJob(FULL, buildRoleInfo({ jobRole: "data  engineer ", companyName: "j & j" }))
    ).toBe(false);
    expect(
      isDifferentJob(buildRoleInfo({ jobRole: "PM", companyName: "Google" }), buildRoleInfo({ companyName: "Google LLC" }))
    ).toBe(false);
    expect(
      isDifferentJob(buildRoleInfo({ companyName: "Acme Corp." }), buildRoleInfo({ companyName: "ACME" }))
    ).toBe(false);
  });

  it("is true when the role changes", () => {
    expect(isDifferentJob(FULL, buildRoleInfo({ jobRole: "Senior Data Engineer" }))).toBe(true);
  });

  it("is true when the company changes", () => {
    expect(isDifferentJob(FULL, buildRoleInfo({ companyName: "Google" }))).toBe(true);
  });

  it("does not count a location change or unknown values", () => {
    expect(isDifferentJob(FULL, buildRoleInfo({ location: "London" }))).toBe(false);
    expect(isDifferentJob(FULL, buildRoleInfo())).toBe(false);
    expect(isDifferentJob(buildRoleInfo(), buildRoleInfo({ jobRole: "PM" }))).toBe(false);
  });
});
