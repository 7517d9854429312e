import { ParseError } from "../errors.js";

/**
 * Reads a numeric payload field. Missing, empty and dash values mean the
 * provider has no figure right now; anything else that is not a number is a
 * malformed payload.
 */
export function parseNumericField(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new ParseError(`non-finite number: ${value}`);
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "" || trimmed === "-" || trimmed === "--") return null;
    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed)) throw new ParseError(`not a number: ${trimmed}`);
    return parsed;
  }
  throw new ParseError(`unsupported value type: ${typeof value}`);
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ParseError("invalid json", { cause: err });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Splits `var hq_str_x="a,b,c";` style payloads into their comma fields. */
export function splitQuotedFields(text: string): string[] | null {
  const idx = text.indexOf("=\"");
  if (idx === -1) return null;
  const rest = text.slice(idx + 2);
  const end = rest.indexOf("\"");
  const body = end === -1 ? rest : rest.slice(0, end);
  if (!body.trim()) return null;
  return body.split(",");
}

export function padCode(code: string, width: number): string {
  return code.length < width ? code.padStart(width, "0") : code;
}
