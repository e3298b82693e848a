/**
 * Text sanitisation and date normalisation for document values.
 */

// C0, DEL and C1 controls; tab, LF and CR are kept.
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g;

/** Strip control characters and trim. Blank results count as absent. */
export function cleanText(value: string | number | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const cleaned = String(value).replace(CONTROL_CHARS, "").trim();
  return cleaned === "" ? undefined : cleaned;
}

export function escapeText(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function escapeAttribute(value: string): string {
  return escapeText(value).replace(/"/g, "&quot;");
}

/** Plain decimal notation for a finite number (never an exponent form). */
export function formatDecimal(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign = "", lead = "", fraction = "", exponent = "0"] = match;
  const digits = lead + fraction;
  const point = 1 + Number(exponent);
  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${"0".repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export type ParsedDate =
  | { status: "absent" }
  | { status: "invalid"; raw: string }
  | { status: "ok"; kind: "date" | "dateTime"; value: string };

const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Normalise a stored date value.
 *
 * Date-only values become `YYYY-MM-DD`; values with a time component become
 * `YYYY-MM-DDTHH:MM:SS` (fractional seconds and zone designators dropped).
 * Anything else, including impossible calendar dates, is "invalid".
 */
export function parseIsoDate(value: string | null | undefined): ParsedDate {
  const raw = cleanText(value);
  if (raw === undefined) return { status: "absent" };

  const match = DATE_PATTERN.exec(raw);
  if (!match) return { status: "invalid", raw };

  const [, year = "", month = "", day = "", hour, minute, second = "00"] = match;
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  const probe = new Date(Date.UTC(y, m - 1, d));
  if (probe.getUTCFullYear() !== y || probe.getUTCMonth() !== m - 1 || probe.getUTCDate() !== d) {
    return { status: "invalid", raw };
  }

  const datePart = `${year}-${month}-${day}`;
  if (hour === undefined || minute === undefined) {
    return { status: "ok", kind: "date", value: datePart };
  }
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    return { status: "invalid", raw };
  }
  return { status: "ok", kind: "dateTime", value: `${datePart}T${hour}:${minute}:${second}` };
}
