/**
 * Quote normalisation — map typographic quote glyphs to ASCII.
 *
 * Pure string-to-string; used by the cleanup runner but independent of any
 * database connection.
 */

const SINGLE = "'";
const DOUBLE = '"';

const NORMALISATION_MAP: ReadonlyMap<string, string> = new Map([
  ["‘", SINGLE], // left single quotation mark
  ["’", SINGLE], // right single quotation mark
  ["‚", SINGLE], // single low-9
  ["‛", SINGLE], // single high-reversed-9
  ["′", SINGLE], // prime
  ["‵", SINGLE], // reversed prime
  ["`", SINGLE], // grave accent
  ["´", SINGLE], // acute accent
  ["ʻ", SINGLE],
  ["ʼ", SINGLE],
  ["❛", SINGLE],
  ["❜", SINGLE],
  ["❟", SINGLE],
  ["❠", SINGLE],
  ["¿", SINGLE], // inverted question mark, a common mis-decoded apostrophe
  ["“", DOUBLE], // left double quotation mark
  ["”", DOUBLE], // right double quotation mark
  ["„", DOUBLE], // double low-9
  ["‟", DOUBLE], // double high-reversed-9
  ["″", DOUBLE], // double prime
  ["‶", DOUBLE], // reversed double prime
  ["«", DOUBLE], // guillemets
  ["»", DOUBLE],
  ["˝", DOUBLE],
  ["❝", DOUBLE],
  ["❞", DOUBLE],
  ["〝", DOUBLE],
  ["〞", DOUBLE],
  ["〟", DOUBLE],
]);

const PATTERN = new RegExp(`[${[...NORMALISATION_MAP.keys()].join("")}]`, "g");

export function normaliseQuotes(value: string): string {
  return value.replace(PATTERN, (glyph) => NORMALISATION_MAP.get(glyph) ?? glyph);
}
