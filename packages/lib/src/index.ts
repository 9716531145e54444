export { NvimHostClient } from "./client/nvimHostClient";
export type { NvimHostClientInit } from "./client/nvimHostClient";
export { asyncCall, go, threadsafeCall } from "./client/callBridge";
export type { GoOptions } from "./client/callBridge";
export { ResultSlot } from "./client/resultSlot";
export type { SlotState } from "./client/resultSlot";
export { SerialHostLoop } from "./client/hostLoop";
export type { SerialHostLoopInit } from "./client/hostLoop";
export { awrite, bench, formatMessage, write } from "./client/messages";
export type { BenchOptions, WriteOptions } from "./client/messages";
export { getSelected, operatorMarks, setVisualSelection, writable } from "./client/operators";
export { DEBUG_ENV, resolveOptions } from "./client/options";
export type { NvimHostResolvedOptions } from "./client/options";
export type { DebugLog } from "./client/debugLog";
export { charWidth, displayWidth } from "./utils/displayWidth";
export { decode, encode, recode } from "./utils/encoding";
export { errorMessage, HostDeadlockError, InvalidBufferError } from "./utils/errors";
export { extractBufId } from "./utils/msgpackHandles";
export { escape, expandTabs, pIndent } from "./utils/text";
export {
  byteIndexToCharIndex,
  sliceByByteColumns,
  utf8ByteLength,
  utf8StringByteLength,
} from "./utils/utf8";
export type {
  BufferRef,
  HostLoop,
  Mark,
  NvimHostOptions,
  NvimRpc,
  RpcCall,
  TextEncoding,
  VisualType,
} from "./types";
