import { describe, it, expect } from "vitest";
import { parseSpaceConfig } from "@/lib/genie/space-config";
import { getConfigTemplate, TEMPLATE_DOMAINS } from "@/lib/genie/templates";

describe("getConfigTemplate", () => {
  it.each(TEMPLATE_DOMAINS)("returns a schema-valid %s template", (domain) => {
    const lookup = getConfigTemplate(domain);
    expect(lookup.ok).toBe(true);
    if (!lookup.ok) return;
    expect(lookup.domain).toBe(domain);
    expect(lookup.placeholders).toEqual(["[CATALOG]", "[SCHEMA]", "[TABLE_NAME]"]);
    expect(parseSpaceConfig(lookup.template).success).toBe(true);
  });

  it("uses placeholders for the table identifiers", () => {
    const lookup = getConfigTemplate("minimal");
    if (!lookup.ok) throw new Error("minimal template missing");
    expect(lookup.template.space_name).toBe("Quick Start Space");
    expect(lookup.template.tables).toEqual([
      { catalog_name: "[CATALOG]", schema_name: "[SCHEMA]", table_name: "[TABLE_NAME]" },
    ]);
  });

  it("hands out copies", () => {
    const first = getConfigTemplate("sales");
    if (!first.ok) throw new Error("sales template missing");
    first.template.space_name = "Changed";
    first.template.tables.length = 0;

    const second = getConfigTemplate("sales");
    if (!second.ok) throw new Error("sales template missing");
    expect(second.template.space_name).toBe("Sales Analytics");
    expect(second.template.tables).toHaveLength(1);
  });

  it("rejects unknown domains and lists the valid ones", () => {
    expect(getConfigTemplate("marketing")).toEqual({
      ok: false,
      error: "Unknown template domain 'marketing'. Valid domains: minimal, sales, customer, inventory, financial, hr",
      valid_domains: ["minimal", "sales", "customer", "inventory", "financial", "hr"],
    });
  });
});
