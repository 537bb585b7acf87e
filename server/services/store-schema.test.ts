import { describe, expect, it } from "vitest";
import type { StoreRecord } from "../capabilities/types.js";
import type { Lead, LeadSchemaMapping } from "../domain/types.js";
import { buildLeadProperties, dedupeFilters, inferSchema, readRecordIdentity, statusProperties } from "./store-schema.js";

const sample: StoreRecord = {
  id: "page-1",
  properties: {
    Name: { type: "title", value: "Existing Lead" },
    Company: { type: "rich_text", value: "Finly" },
    "Job Title": { type: "rich_text", value: "CTO" },
    Email: { type: "email", value: "lead@finly.test" },
    Source: { type: "url", value: "https://finly.test" },
    Status: { type: "status", value: "stored" },
    Notes: { type: "rich_text", value: "" }
  }
};

const mapping: LeadSchemaMapping = {
  name: { property: "Name", type: "title" },
  company: { property: "Company", type: "rich_text" },
  role: { property: "Job Title", type: "rich_text" },
  email: { property: "Email", type: "email" },
  sourceUrl: { property: "Source", type: "url" },
  status: { property: "Status", type: "status" },
  notes: { property: "Notes", type: "rich_text" }
};

const lead: Lead = {
  id: "lead-1",
  name: "Ana Weber",
  role: "CTO",
  company: "Finly GmbH",
  email: "ana@finly.test",
  sourceUrl: "https://finly.test/team",
  confidence: "high",
  notes: ["Ana leads engineering"],
  freshness: "Source dated 2025-12-01 (90 days old)",
  status: "approved",
  foundAt: "2026-03-01T12:00:00.000Z"
};

describe("inferSchema", () => {
  it("binds lead fields by property-name aliases", () => {
    expect(inferSchema(sample)).toEqual({ mapping });
  });

  it("uses the title property as the name", () => {
    const result = inferSchema({
      id: "page-2",
      properties: {
        Contact: { type: "rich_text", value: "" },
        Title: { type: "title", value: "Someone" },
        Company: { type: "rich_text", value: "" }
      }
    });

    expect(result).toEqual({
      mapping: {
        name: { property: "Title", type: "title" },
        company: { property: "Company", type: "rich_text" }
      }
    });
  });

  it("reports a missing name binding", () => {
    const result = inferSchema({
      id: "page-3",
      properties: { Company: { type: "rich_text", value: "" }, "E-mail": { type: "email", value: "" } }
    });
    expect(result).toEqual({ missing: ["name"] });
  });
});

describe("buildLeadProperties", () => {
  it("writes every mapped field, with overrides", () => {
    expect(buildLeadProperties(lead, mapping, { status: "stored" })).toEqual({
      Name: { type: "title", value: "Ana Weber" },
      Company: { type: "rich_text", value: "Finly GmbH" },
      "Job Title": { type: "rich_text", value: "CTO" },
      Email: { type: "email", value: "ana@finly.test" },
      Source: { type: "url", value: "https://finly.test/team" },
      Status: { type: "status", value: "stored" },
      Notes: {
        type: "rich_text",
        value: "confidence: high; Ana leads engineering; Source dated 2025-12-01 (90 days old)"
      }
    });
  });

  it("leaves out empty values", () => {
    const properties = buildLeadProperties({ ...lead, email: undefined, role: undefined }, mapping);
    expect(Object.keys(properties)).toEqual(["Name", "Company", "Source", "Status", "Notes"]);
  });

  it("only touches the status property for status updates", () => {
    expect(statusProperties(mapping, "contacted")).toEqual({ Status: { type: "status", value: "contacted" } });
    expect(statusProperties({ name: mapping.name }, "contacted")).toEqual({});
  });
});

describe("dedupe helpers", () => {
  it("looks up by lowercased email and by name", () => {
    expect(dedupeFilters({ ...lead, email: " Ana@Finly.TEST " }, mapping)).toEqual([
      { property: "Email", type: "email", equals: "ana@finly.test" },
      { property: "Name", type: "title", equals: "Ana Weber" }
    ]);
    expect(dedupeFilters({ ...lead, email: undefined }, mapping)).toEqual([
      { property: "Name", type: "title", equals: "Ana Weber" }
    ]);
  });

  it("reads a record's identity through the mapping", () => {
    expect(readRecordIdentity(sample, mapping)).toEqual({
      name: "Existing Lead",
      company: "Finly",
      email: "lead@finly.test"
    });
  });
});
