import type { StoreFilter, StoreRecord } from "../capabilities/types.js";
import type { Lead, LeadField, LeadSchemaMapping, PropertyBinding, StoreProperties } from "../domain/types.js";

const propertyAliases: Record<LeadField, string[]> = {
  name: ["name", "fullname", "contact", "contactname", "lead", "leadname", "person"],
  company: ["company", "companyname", "organization", "organisation", "org", "account", "employer"],
  role: ["role", "title", "jobtitle", "position", "designation"],
  email: ["email", "emailaddress", "mail", "workemail"],
  sourceUrl: ["source", "sourceurl", "url", "link", "sourcelink", "profile", "linkedin"],
  status: ["status", "stage", "leadstatus", "pipeline"],
  notes: ["notes", "note", "comments", "confidence", "details", "summary"]
};

const fieldOrder: LeadField[] = ["name", "company", "role", "email", "sourceUrl", "status", "notes"];

function normalizePropertyName(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, "");
}

export type SchemaInference = { mapping: LeadSchemaMapping } | { missing: LeadField[] };

export function inferSchema(sample: StoreRecord): SchemaInference {
  const bindings: Partial<Record<LeadField, PropertyBinding>> = {};
  const used = new Set<string>();
  const entries = Object.entries(sample.properties);

  for (const field of fieldOrder) {
    const aliases = propertyAliases[field];
    const match = entries.find(([name]) => !used.has(name) && aliases.includes(normalizePropertyName(name)));
    if (match) {
      bindings[field] = { property: match[0], type: match[1].type };
      used.add(match[0]);
    }
  }

  // The title column is the record name in page-based stores.
  const title = entries.find(([, property]) => property.type === "title");
  if (title && bindings.name?.type !== "title") {
    if (bindings.name) used.delete(bindings.name.property);
    const displaced = fieldOrder.find((field) => field !== "name" && bindings[field]?.property === title[0]);
    if (displaced) delete bindings[displaced];
    bindings.name = { property: title[0], type: "title" };
  }

  const name = bindings.name;
  if (!name) return { missing: ["name"] };
  return { mapping: { ...bindings, name } };
}

function leadFieldValue(lead: Lead, field: LeadField): string {
  switch (field) {
    case "name":
      return lead.name;
    case "company":
      return lead.company;
    case "role":
      return lead.role ?? "";
    case "email":
      return lead.email ?? "";
    case "sourceUrl":
      return lead.sourceUrl;
    case "status":
      return lead.status;
    case "notes":
      return [`confidence: ${lead.confidence}`, ...lead.notes, lead.freshness].join("; ");
  }
}

export function buildLeadProperties(
  lead: Lead,
  mapping: LeadSchemaMapping,
  overrides: Partial<Record<LeadField, string>> = {}
): StoreProperties {
  const properties: StoreProperties = {};
  for (const field of fieldOrder) {
    const binding = mapping[field];
    if (!binding) continue;
    const value = overrides[field] ?? leadFieldValue(lead, field);
    // Empty values would clear what the store already holds on update.
    if (!value) continue;
    properties[binding.property] = { type: binding.type, value };
  }
  return properties;
}

export function statusProperties(mapping: LeadSchemaMapping, status: Lead["status"]): StoreProperties {
  const binding = mapping.status;
  return binding ? { [binding.property]: { type: binding.type, value: status } } : {};
}

export function readRecordIdentity(
  record: StoreRecord,
  mapping: LeadSchemaMapping
): { name: string; company: string; email?: string } {
  const value = (binding?: PropertyBinding): string => (binding ? record.properties[binding.property]?.value ?? "" : "");
  const email = value(mapping.email);
  return {
    name: value(mapping.name),
    company: value(mapping.company),
    email: email || undefined
  };
}

// Stored records may lack an email the lead has, so the name lookup always runs.
export function dedupeFilters(lead: Lead, mapping: LeadSchemaMapping): StoreFilter[] {
  const byName: StoreFilter = { property: mapping.name.property, type: mapping.name.type, equals: lead.name.trim() };
  const email = lead.email?.trim().toLowerCase();
  if (!email || !mapping.email) return [byName];
  return [{ property: mapping.email.property, type: mapping.email.type, equals: email }, byName];
}
