const WHITESPACE = new Set([" ", "\t", "\n", "\r", "\v", "\f"]);

export function expandTabs(line: string, tabsize: number): string {
  if (tabsize <= 0) return line.replace(/\t/g, "");
  let out = "";
  let col = 0;
  for (const char of line) {
    if (char === "\t") {
      const pad = tabsize - (col % tabsize);
      out += " ".repeat(pad);
      col += pad;
    } else if (char === "\n" || char === "\r") {
      out += char;
      col = 0;
    } else {
      out += char;
      col += 1;
    }
  }
  return out;
}

/** Column of the first non-whitespace character, or 0 for a blank line. */
export function pIndent(line: string, tabsize: number): number {
  const expanded = expandTabs(line, tabsize);
  let idx = 0;
  for (const char of expanded) {
    if (!WHITESPACE.has(char)) return idx;
    idx += 1;
  }
  return 0;
}

export function* escape<T>(stream: Iterable<T>, mapping: ReadonlyMap<T, T>): Generator<T, void, undefined> {
  // Boxed so a mapping to `null` or `undefined` is still a hit.
  const boxed = new Map<T, readonly [T]>();
  for (const [from, to] of mapping) boxed.set(from, [to]);
  for (const unit of stream) {
    const hit = boxed.get(unit);
    yield hit ? hit[0] : unit;
  }
}
