import { eastAsianWidthType } from "get-east-asian-width";

// Line breaks render as a two-cell placeholder (`^J`, `^M`).
const SPECIAL = new Set(["\n", "\r"]);

export function charWidth(char: string, tabsize: number): number {
  if (char === "\t") return tabsize >= 1 ? tabsize : 1;
  if (SPECIAL.has(char)) return 2;
  const type = eastAsianWidthType(char.codePointAt(0) ?? 0);
  // Neutral covers control and other non-printing characters.
  return type === "wide" || type === "neutral" ? 2 : 1;
}

export function displayWidth(text: string, tabsize: number): number {
  let width = 0;
  for (const char of text) width += charWidth(char, tabsize);
  return width;
}
