/**
 * Removes the control characters that spreadsheet and XML writers reject:
 * 0x00-0x08, 0x0B-0x0C and 0x0E-0x1F. Tab, LF and CR survive.
 */
const RESERVED_CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F]/g;

export function sanitize(value: unknown): string {
  if (value === null || value === undefined) return "";
  const text = typeof value === "string" ? value : String(value);
  return text.replace(RESERVED_CONTROL_CHARS, "");
}

/**
 * Applies `sanitize` to every string inside arrays and plain objects.
 * Numbers, booleans and null are returned as they are.
 */
export function sanitizeDeep<T>(value: T): T;
export function sanitizeDeep(value: unknown): unknown {
  if (typeof value === "string") return sanitize(value);
  if (Array.isArray(value)) return value.map((item) => sanitizeDeep(item));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[sanitize(key)] = sanitizeDeep(item);
    }
    return out;
  }
  return value;
}
