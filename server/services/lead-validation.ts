import dayjs from "dayjs";
import { v4 as uuid } from "uuid";
import type { DroppedLead, IdealCustomerProfile, Lead, LeadConfidence } from "../domain/types.js";
import { companyTokens, hasSourceUrl, isSameLead, nameTokens } from "./lead-normalization.js";

export interface CandidateLead {
  name: string;
  role?: string;
  company: string;
  email?: string;
  sourceUrl?: string;
  snippet?: string;
  publishedAt?: string;
  query?: string;
}

export interface ValidationOptions {
  now: string;
  staleAfterDays: number;
}

export interface ValidationResult {
  leads: Lead[];
  dropped: DroppedLead[];
}

const roleAliases: Array<{ canonical: string; terms: string[] }> = [
  { canonical: "ceo", terms: ["chief executive officer", "ceo"] },
  { canonical: "cto", terms: ["chief technology officer", "chief technical officer", "cto"] },
  { canonical: "cfo", terms: ["chief financial officer", "cfo"] },
  { canonical: "coo", terms: ["chief operating officer", "coo"] },
  { canonical: "cmo", terms: ["chief marketing officer", "cmo"] },
  { canonical: "cro", terms: ["chief revenue officer", "cro"] },
  { canonical: "cpo", terms: ["chief product officer", "cpo"] },
  { canonical: "ciso", terms: ["chief information security officer", "ciso"] },
  { canonical: "cio", terms: ["chief information officer", "cio"] },
  { canonical: "vp", terms: ["vice president", "svp", "evp", "vp"] },
  { canonical: "founder", terms: ["co founder", "cofounder", "founder"] },
  { canonical: "head", terms: ["head of", "head"] },
  { canonical: "director", terms: ["director"] }
];

const fillerWords = new Set(["of", "and", "the", "for", "at", "&"]);

interface RoleSignature {
  canonical: Set<string>;
  residual: string[];
  tokens: Set<string>;
}

function normalizeRoleText(value: string): string {
  return nameTokens(value).join(" ");
}

function roleSignature(value: string): RoleSignature {
  const normalized = normalizeRoleText(value);
  let remaining = ` ${normalized} `;
  const canonical = new Set<string>();

  for (const alias of roleAliases) {
    for (const term of alias.terms) {
      if (remaining.includes(` ${term} `)) {
        canonical.add(alias.canonical);
        remaining = remaining.split(` ${term} `).join(" ");
      }
    }
  }

  return {
    canonical,
    residual: remaining.split(" ").filter((token) => token.length > 0 && !fillerWords.has(token)),
    tokens: new Set(normalized.split(" ").filter((token) => token.length > 0))
  };
}

export function roleFits(role: string, icpRoles: string[]): boolean {
  const candidate = roleSignature(role);

  return icpRoles.some((icpRole) => {
    const wanted = roleSignature(icpRole);
    if (wanted.canonical.size === 0 && wanted.residual.length === 0) return false;
    const canonicalMatch = [...wanted.canonical].every((item) => candidate.canonical.has(item));
    const residualMatch = wanted.residual.every((token) => candidate.tokens.has(token));
    return canonicalMatch && residualMatch;
  });
}

function containsRun(tokens: string[], run: string[]): boolean {
  for (let start = 0; start + run.length <= tokens.length; start += 1) {
    if (run.every((token, offset) => tokens[start + offset] === token)) return true;
  }
  return false;
}

// Whole words only: "Ramp" excludes "Ramp Business" but not "Rampart Security".
export function isExcluded(company: string, exclusions: string[]): string | undefined {
  const tokens = companyTokens(company);
  if (tokens.length === 0) return undefined;
  return exclusions.find((exclusion) => {
    const run = companyTokens(exclusion);
    if (run.length === 0) return false;
    return containsRun(tokens, run) || tokens.join("") === run.join("");
  });
}

const staleSuffix = "may be outdated";

function confidenceFor(role: string | undefined, email: string | undefined, stale: boolean): LeadConfidence {
  const confidence: LeadConfidence = !role ? "low" : email ? "high" : "medium";
  if (!stale) return confidence;
  return confidence === "high" ? "medium" : "low";
}

export function freshnessNote(
  publishedAt: string | undefined,
  options: ValidationOptions
): { note: string; stale: boolean } {
  const now = dayjs(options.now);
  const published = publishedAt ? dayjs(publishedAt) : undefined;

  if (!published || !published.isValid()) {
    return { note: `Source date unknown; found ${now.format("YYYY-MM-DD")}`, stale: false };
  }

  const ageDays = Math.max(0, now.diff(published, "day"));
  const stale = ageDays > options.staleAfterDays;
  const note = `Source dated ${published.format("YYYY-MM-DD")} (${ageDays} days old)`;
  return { note: stale ? `${note}; ${staleSuffix}` : note, stale };
}

function cleanOptional(value?: string): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function validateCandidates(
  candidates: CandidateLead[],
  criteria: IdealCustomerProfile,
  options: ValidationOptions
): ValidationResult {
  const leads: Lead[] = [];
  const dropped: DroppedLead[] = [];

  for (const candidate of candidates) {
    const name = candidate.name.trim();
    const company = candidate.company.trim();
    const role = cleanOptional(candidate.role);
    const email = cleanOptional(candidate.email);

    if (!hasSourceUrl(candidate.sourceUrl)) {
      dropped.push({ name, company, reason: "missing source URL" });
      continue;
    }
    const sourceUrl = candidate.sourceUrl.trim();

    const exclusion = isExcluded(company, criteria.exclusions);
    if (exclusion) {
      dropped.push({ name, company, sourceUrl, reason: `company matches exclusion '${exclusion}'` });
      continue;
    }

    if (role && !roleFits(role, criteria.roles)) {
      dropped.push({ name, company, sourceUrl, reason: `role '${role}' does not match ${criteria.roles.join(" / ")}` });
      continue;
    }

    const existing = leads.find((lead) => isSameLead(lead, { name, company, email }));
    if (existing) {
      const index = leads.indexOf(existing);
      leads[index] = {
        ...existing,
        role: existing.role ?? role,
        email: existing.email ?? email,
        notes: [...existing.notes, `Merged duplicate from ${sourceUrl}`]
      };
      dropped.push({ name, company, sourceUrl, reason: `duplicate of ${existing.name} (merged)` });
      continue;
    }

    const freshness = freshnessNote(candidate.publishedAt, options);
    const notes: string[] = [];
    if (!role) notes.push("role not stated");
    if (!email) notes.push("email not found");
    if (candidate.snippet?.trim()) notes.push(candidate.snippet.trim());

    leads.push({
      id: uuid(),
      name,
      role,
      company,
      email,
      sourceUrl,
      confidence: confidenceFor(role, email, freshness.stale),
      notes,
      freshness: freshness.note,
      status: "proposed",
      foundAt: options.now,
      query: candidate.query
    });
  }

  // A merge can fill in a role or email after the label was assigned.
  return {
    leads: leads.map((lead) => ({
      ...lead,
      confidence: confidenceFor(lead.role, lead.email, lead.freshness.endsWith(staleSuffix)),
      notes: lead.notes.filter(
        (note) => !(note === "role not stated" && lead.role) && !(note === "email not found" && lead.email)
      )
    })),
    dropped
  };
}
