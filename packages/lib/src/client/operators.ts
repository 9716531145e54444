import { EOL } from "node:os";

import type { BufferRef, Mark, NvimRpc, VisualType } from "../types";
import { InvalidBufferError } from "../utils/errors";
import { extractBufId } from "../utils/msgpackHandles";
import { sliceByByteColumns } from "../utils/utf8";

function toMark(raw: unknown, name: string): Mark {
  if (Array.isArray(raw) && raw.length >= 2) {
    const row = Number(raw[0]);
    const col = Number(raw[1]);
    if (Number.isInteger(row) && Number.isInteger(col)) return [row, col];
  }
  throw new Error(`unexpected mark ${name}: ${JSON.stringify(raw)}`);
}

export async function writable(nvim: NvimRpc, buf: BufferRef): Promise<boolean> {
  const modifiable = await nvim.call<unknown>("nvim_buf_get_option", [buf, "modifiable"]);
  return Boolean(modifiable);
}

/**
 * Bounds of the last operator motion (`[`, `]`) or, without a visual type,
 * of the last visual selection (`<`, `>`). (1, 0) indexed.
 */
export async function operatorMarks(
  nvim: NvimRpc,
  buf: BufferRef,
  visualType: VisualType,
): Promise<[Mark, Mark]> {
  const [name1, name2] = visualType ? ["[", "]"] : ["<", ">"];
  const [raw1, raw2] = await Promise.all([
    nvim.call<unknown>("nvim_buf_get_mark", [buf, name1]),
    nvim.call<unknown>("nvim_buf_get_mark", [buf, name2]),
  ]);
  return [toMark(raw1, name1), toMark(raw2, name2)];
}

/** Marks are (1, 0) indexed; `setpos()` takes 1-indexed columns. */
export async function setVisualSelection(
  nvim: NvimRpc,
  buf: BufferRef,
  mark1: Mark,
  mark2: Mark,
): Promise<void> {
  const bufnr = extractBufId(buf);
  if (bufnr == null) throw new InvalidBufferError(buf);
  const [row1, col1] = mark1;
  const [row2, col2] = mark2;
  await nvim.call("nvim_call_function", ["setpos", ["'<", [bufnr, row1, col1 + 1, 0]]]);
  await nvim.call("nvim_call_function", ["setpos", ["'>", [bufnr, row2, col2 + 1, 0]]]);
}

/**
 * Text between the marks of `visualType`. Mark columns are byte offsets and
 * the end column is inclusive. Line-wise selections return whole lines.
 */
export async function getSelected(nvim: NvimRpc, buf: BufferRef, visualType: VisualType): Promise<string> {
  const [[row1, col1], [row2, col2]] = await operatorMarks(nvim, buf, visualType);
  const raw = await nvim.call<unknown>("nvim_buf_get_lines", [buf, row1 - 1, row2, true]);
  const lines = Array.isArray(raw) ? raw.map((line) => String(line ?? "")) : [];
  if (!lines.length) return "";
  if (visualType === "line") return lines.join(EOL);

  if (lines.length === 1) return sliceByByteColumns(lines[0], col1, col2);
  const head = sliceByByteColumns(lines[0], col1);
  const body = lines.slice(1, -1);
  const tail = sliceByByteColumns(lines[lines.length - 1], 0, col2);
  return [head, ...body, tail].join(EOL);
}
