import type { CompleteRoleInfo, RoleInfo, SlotName } from "./types";

export const SLOT_NAMES: readonly SlotName[] = ["jobRole", "location", "companyName"];

const SLOT_LABELS: Record<SlotName, string> = {
  jobRole: "job_role",
  location: "location",
  companyName: "company_name",
};

const NOT_COLLECTED = "Not yet collected";

// Trailing legal suffixes ignored when comparing company names
const COMPANY_SUFFIX = /\s+(inc|llc|ltd|corp|co|corporation|company)$/;

export function emptyRoleInfo(): RoleInfo {
  return { jobRole: null, location: null, companyName: null };
}

/** Blank strings are treated as "not mentioned". */
export function normalizeSlot(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Merges newly extracted slots into the stored ones. With `reset`, the
 * incoming value replaces everything; otherwise a known value is never
 * downgraded to null.
 */
export function mergeRoleInfo(existing: RoleInfo, incoming: RoleInfo, reset: boolean): RoleInfo {
  if (reset) return { ...incoming };
  return {
    jobRole: normalizeSlot(incoming.jobRole) ?? existing.jobRole,
    location: normalizeSlot(incoming.location) ?? existing.location,
    companyName: normalizeSlot(incoming.companyName) ?? existing.companyName,
  };
}

export function isRoleInfoComplete(info: RoleInfo): info is CompleteRoleInfo {
  return info.jobRole !== null && info.location !== null && info.companyName !== null;
}

export function missingSlots(info: RoleInfo): SlotName[] {
  return SLOT_NAMES.filter((slot) => info[slot] === null);
}

export function slotLabel(slot: SlotName): string {
  return SLOT_LABELS[slot];
}

/**
 * Renders one line per slot for prompts, labelling unknown values explicitly
 * so the model does not read them as required-but-missing input.
 */
export function formatCollectedSlots(info: RoleInfo): string {
  return SLOT_NAMES.map((slot) => `- ${SLOT_LABELS[slot]}: ${info[slot] ?? NOT_COLLECTED}`).join("\n");
}

function canonical(value: string): string {
  return value
    .toLowerCase()
    .replace(/[&.,'’()\-/]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function canonicalCompany(value: string): string {
  return canonical(value).replace(COMPANY_SUFFIX, "").replace(/\s+/g, "");
}

function canonicalRole(value: string): string {
  return canonical(value).replace(/\s+/g, "");
}

function differs(a: string | null, b: string | null, normalize: (v: string) => string): boolean {
  if (a === null || b === null) return false;
  return normalize(a) !== normalize(b);
}

/**
 * True when the incoming slots describe a different job than the stored ones:
 * the role or the company changed after case, spacing, punctuation and
 * company-suffix normalisation. Location alone never counts, and an unknown
 * value on either side is not a difference.
 */
export function isDifferentJob(stored: RoleInfo, incoming: RoleInfo): boolean {
  return (
    differs(stored.jobRole, normalizeSlot(incoming.jobRole), canonicalRole) ||
    differs(stored.companyName, normalizeSlot(incoming.companyName), canonicalCompany)
  );
}
