// engine/src/programText.ts
// Cleanup of model output before it is stored or delivered.

const EFFORT_PATTERNS: RegExp[] = [
  /\(?\s*RPE\s*=?\s*\d+(?:\s*-\s*\d+)?\s*\)?/gi,
  /\(?\s*RIR\s*=?\s*\d+(?:\s*-\s*\d+)?\s*\)?/gi,
  /(?:почти\s+)?до\s+отказа/gi,
];

/** Removes RPE/RIR markers and HTML line breaks; keeps Markdown intact. */
export function sanitizeGeneratedText(text: string): string {
  let out = text || "";
  for (const re of EFFORT_PATTERNS) out = out.replace(re, "");

  out = out.replace(/\s*<br\s*\/?>\s*/gi, "\n").replace(/<\/?p\s*\/?>/gi, "\n");
  out = out.replace(/^[ \t]*•[ \t]+/gm, "- ");
  out = out.replace(/(\d)[ \t]*[xXх*][ \t]*(\d)/g, "$1×$2");

  out = out
    .replace(/\(\s*\)/g, "")
    .replace(/,\s*,/g, ", ")
    .replace(/[ \t]{2,}/g, " ")
    .replace(/[ \t]+,/g, ",")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n[ \t]+/g, "\n")
    .replace(/\n{3,}/g, "\n\n");

  // a lone backtick left open at the end breaks Markdown parsing
  if ((out.match(/`/g) ?? []).length % 2 === 1) {
    const idx = out.lastIndexOf("`");
    out = out.slice(0, idx) + out.slice(idx + 1);
  }
  return out.trim();
}

export function withNamePrefix(name: string | null, text: string): string {
  const n = (name ?? "").trim();
  return n ? `${n}, обработал твой запрос — вот что получилось ⬇️\n\n${text}` : text;
}
