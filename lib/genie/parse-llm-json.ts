import { logger } from "@/lib/logger";

/**
 * Parse JSON from a model reply that may be wrapped in markdown code
 * fences, surrounded by prose, or carry a BOM.
 *
 * Strategies, in order:
 * 1. Raw JSON.parse
 * 2. Content between ```json / ``` fences
 * 3. Bracket match: first { or [ to the matching last } or ]
 * 4. Repair trailing commas and missing commas between elements
 */
export function parseLLMJson(raw: string): unknown {
  const trimmed = raw.replace(/^\uFEFF/, "").trim();

  const direct = tryParse(trimmed);
  if (direct.ok) return direct.value;

  const candidates: string[] = [];
  const fenced = extractFromFences(trimmed);
  if (fenced !== null) {
    candidates.push(fenced);
    const inner = extractBrackets(fenced);
    if (inner !== null) candidates.push(inner);
  }
  const bracketed = extractBrackets(trimmed);
  if (bracketed !== null) candidates.push(bracketed);

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }
  for (const candidate of candidates) {
    const repaired = tryParse(repairLlmJson(candidate));
    if (repaired.ok) return repaired.value;
  }

  logger.warn("parseLLMJson: all strategies failed", {
    rawLength: trimmed.length,
    raw: trimmed.slice(0, 2000),
  });
  throw new SyntaxError(
    `parseLLMJson: unable to extract valid JSON from model reply (${trimmed.length} chars, starts with: ${JSON.stringify(trimmed.slice(0, 60))})`,
  );
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function extractFromFences(text: string): string | null {
  const open = text.indexOf("```");
  if (open === -1) return null;
  const bodyStart = text.indexOf("\n", open);
  if (bodyStart === -1) return null;
  const close = text.indexOf("```", bodyStart);
  return (close === -1 ? text.slice(bodyStart + 1) : text.slice(bodyStart + 1, close)).trim();
}

function extractBrackets(text: string): string | null {
  const objStart = text.indexOf("{");
  const arrStart = text.indexOf("[");
  let start: number;
  let closer: string;
  if (objStart !== -1 && (arrStart === -1 || objStart < arrStart)) {
    start = objStart;
    closer = "}";
  } else if (arrStart !== -1) {
    start = arrStart;
    closer = "]";
  } else {
    return null;
  }
  const end = text.lastIndexOf(closer);
  return end > start ? text.slice(start, end + 1) : null;
}

/**
 * Fix common structural JSON errors in model output. Literal newlines only
 * appear between tokens in valid JSON, so `}\n{` is a missing comma.
 */
function repairLlmJson(text: string): string {
  return text
    .replace(/,\s*([}\]])/g, "$1")
    .replace(/}\s*\n\s*{/g, "},\n{")
    .replace(/]\s*\n\s*\[/g, "],\n[")
    .replace(/"\s*\n\s*"/g, '",\n"');
}
