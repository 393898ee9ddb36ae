/**
 * Labeled-output scanning for recovering fields from free-form LLM text.
 *
 * Model answers are requested as `LABEL: value` lines. These helpers scan the
 * text line by line and never throw; a missing field is simply absent from the
 * result, and each call site applies its own default.
 */

/**
 * Uppercase, strip accents and collapse whitespace so that
 * "Decisão", "DECISAO" and "decision " can be compared by alias.
 */
export function normalizeLabel(raw: string): string {
  return raw
    .normalize("NFD")
    .replace(/\p{M}/gu, "")
    .replace(/\s+/g, " ")
    .trim()
    .toUpperCase();
}

/** Strip list bullets, heading markers and markdown emphasis from a line. */
function cleanLine(line: string): string {
  return line
    .replace(/^\s*(?:[-*•>]+|#{1,6}|\d+[.)])\s*/, "")
    .replace(/\*\*|__/g, "")
    .trim();
}

const LABEL_LINE = /^([\p{L}][\p{L} _]{0,39}?)\s*:\s*(.*)$/u;

/**
 * Scan `text` for the labels in `aliases`. Each key maps to every accepted
 * spelling of its label (compared after `normalizeLabel`).
 *
 * - The first occurrence of a label wins; repeats are ignored.
 * - Lines after a label that are not themselves a known label are appended to
 *   that label's value (multi-line reasoning, or a value on the next line).
 */
export function parseLabeledOutput<K extends string>(
  text: string,
  aliases: Record<K, readonly string[]>,
): Partial<Record<K, string>> {
  const lookup = new Map<string, K>();
  for (const key in aliases) {
    for (const alias of aliases[key]) {
      lookup.set(normalizeLabel(alias), key);
    }
  }

  const collected = new Map<K, string[]>();
  let current: K | null = null;

  for (const rawLine of String(text ?? "").split(/\r?\n/)) {
    const line = cleanLine(rawLine);
    if (!line) continue;

    const match = LABEL_LINE.exec(line);
    const key = match ? lookup.get(normalizeLabel(match[1])) : undefined;

    if (match && key !== undefined) {
      if (collected.has(key)) {
        // Repeated label: stop collecting until the next new label.
        current = null;
        continue;
      }
      const value = match[2].trim();
      collected.set(key, value ? [value] : []);
      current = key;
      continue;
    }

    if (current !== null) {
      collected.get(current)?.push(line);
    }
  }

  const result: Partial<Record<K, string>> = {};
  for (const [key, parts] of collected) {
    const value = parts.join("\n").trim();
    if (value) result[key] = value;
  }
  return result;
}

/**
 * Leading token of a field value, uppercased and accent-free, with brackets
 * and trailing punctuation removed: "[Sufficient]." -> "SUFFICIENT".
 */
export function leadingToken(value: string | undefined): string | null {
  if (!value) return null;
  const cleaned = normalizeLabel(value.replace(/[[\]()"'`]/g, " "));
  const token = cleaned.split(" ")[0]?.replace(/[^A-Z_]/g, "");
  return token ? token : null;
}

/**
 * Parse a confidence value into [0, 1]. Accepts "0.8", "0,8", "80%" and "80";
 * other values are clamped.
 * Returns null when no number is present.
 */
export function parseConfidence(value: string | undefined): number | null {
  if (!value) return null;
  const match = /(-?\d+(?:[.,]\d+)?)\s*(%)?/.exec(value);
  if (!match) return null;

  let n = Number(match[1].replace(",", "."));
  if (!Number.isFinite(n)) return null;
  // "80%" and "80" are percentages; "1.5" is just out of range
  if (match[2] === "%" || (n > 1 && Number.isInteger(n))) n = n / 100;
  return Math.min(1, Math.max(0, n));
}

/** Split a comma-separated list field, dropping empty entries. */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0 && !/^(none|nenhuma?|n\/a|-)$/i.test(s));
}
