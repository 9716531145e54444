// Positive fixint, or uint 8/16/32. Buffer numbers never need wider forms.
function decodeHandleId(data: Uint8Array): number | null {
  const t = data[0];
  if (data.length === 1) return t <= 0x7f ? t : null;
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  switch (t) {
    case 0xcc: return data.length === 2 ? view.getUint8(1) : null;
    case 0xcd: return data.length === 3 ? view.getUint16(1) : null;
    case 0xce: return data.length === 5 ? view.getUint32(1) : null;
    default: return null;
  }
}

function toUint8(data: unknown): Uint8Array | null {
  if (data instanceof Uint8Array) return data;
  if (Array.isArray(data)) return Uint8Array.from(data, Number);
  return null;
}

/**
 * Buffer number behind a handle. Handles arrive either as plain integers or
 * as msgpack ext values whose payload is a msgpack-encoded integer.
 */
export function extractBufId(val: unknown): number | null {
  if (val && typeof val === "object" && "type" in val && typeof val.type === "number" && "data" in val) {
    const data = toUint8(val.data);
    const id = data && data.length > 0 ? decodeHandleId(data) : null;
    return id != null && id > 0 ? id : null;
  }
  const num = Number(val);
  if (Number.isInteger(num) && num > 0) return num;
  return null;
}
