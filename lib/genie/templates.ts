/**
 * Domain starter templates.
 *
 * Templates carry [CATALOG], [SCHEMA] and [TABLE_NAME] placeholders to be
 * replaced before the configuration is validated or used.
 */

import templateData from "@/data/config-templates.json";
import type { GenieSpaceConfigInput } from "./space-config";

export const TEMPLATE_DOMAINS = ["minimal", "sales", "customer", "inventory", "financial", "hr"] as const;
export type TemplateDomain = (typeof TEMPLATE_DOMAINS)[number];

const TEMPLATES: Record<TemplateDomain, GenieSpaceConfigInput> = templateData.templates;

export const TEMPLATE_PLACEHOLDERS: readonly string[] = templateData.placeholders;

export function isTemplateDomain(value: string): value is TemplateDomain {
  return (TEMPLATE_DOMAINS as readonly string[]).includes(value);
}

export type TemplateLookup =
  | { ok: true; domain: TemplateDomain; template: GenieSpaceConfigInput; placeholders: readonly string[] }
  | { ok: false; error: string; valid_domains: readonly TemplateDomain[] };

/** Unknown domains are a caller error; there is no fallback. */
export function getConfigTemplate(domain: string): TemplateLookup {
  if (!isTemplateDomain(domain)) {
    return {
      ok: false,
      error: `Unknown template domain '${domain}'. Valid domains: ${TEMPLATE_DOMAINS.join(", ")}`,
      valid_domains: TEMPLATE_DOMAINS,
    };
  }
  return {
    ok: true,
    domain,
    template: structuredClone(TEMPLATES[domain]),
    placeholders: TEMPLATE_PLACEHOLDERS,
  };
}
