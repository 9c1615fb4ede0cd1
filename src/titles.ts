// Title codes accepted by the /titled/{title} endpoint, in default export order.
export const TITLE_CATEGORIES = [
  "GM",
  "WGM",
  "IM",
  "WIM",
  "FM",
  "WFM",
  "NM",
  "WNM",
  "CM",
  "WCM",
] as const;

export type TitleCategory = (typeof TITLE_CATEGORIES)[number];

export function isTitleCategory(code: string): code is TitleCategory {
  return TITLE_CATEGORIES.some((t) => t === code);
}

// "gm, im" | ["GM", "IM"] → ["GM", "IM"]
export function parseTitles(raw: string | readonly string[]): TitleCategory[] {
  const parts = typeof raw === "string" ? raw.split(",") : raw;
  const out: TitleCategory[] = [];
  for (const part of parts) {
    const code = part.trim().toUpperCase();
    if (!code) continue;
    if (!isTitleCategory(code)) {
      throw new Error(
        `Unknown title category: ${part.trim()} (expected one of ${TITLE_CATEGORIES.join(", ")})`,
      );
    }
    if (!out.includes(code)) out.push(code);
  }
  if (out.length === 0) throw new Error("No title categories given");
  return out;
}
