import type { HostLoop } from "../types";
import { errorMessage } from "../utils/errors";
import { createErrorLog, type DebugLog } from "./debugLog";

export type SerialHostLoopInit = {
  debugLog?: DebugLog;
};

/**
 * FIFO callback queue drained on the Node.js event loop. Callbacks run one
 * at a time in submission order; a throwing callback is logged and the
 * drain continues.
 */
export class SerialHostLoop implements HostLoop {
  private readonly errorLog: DebugLog;
  private queue: Array<() => void> = [];
  private queueHead = 0;
  private drainTimer: NodeJS.Immediate | null = null;
  private draining = false;

  constructor(init: SerialHostLoopInit = {}) {
    this.errorLog = createErrorLog(init);
  }

  asyncCall(fn: () => void): void {
    this.queue.push(fn);
    this.scheduleDrain();
  }

  isDraining(): boolean {
    return this.draining;
  }

  pending(): number {
    return this.queue.length - this.queueHead;
  }

  flush(): void {
    if (this.draining) return;
    if (this.drainTimer) {
      clearImmediate(this.drainTimer);
      this.drainTimer = null;
    }
    this.draining = true;
    try {
      while (this.queueHead < this.queue.length) {
        const next = this.queue[this.queueHead];
        this.queueHead += 1;
        try {
          next();
        } catch (err) {
          this.errorLog(`host callback failed: ${errorMessage(err)}`);
        }
      }
      this.queue = [];
      this.queueHead = 0;
    } finally {
      this.draining = false;
    }
  }

  private scheduleDrain(): void {
    if (this.drainTimer || this.draining) return;
    this.drainTimer = setImmediate(() => {
      this.drainTimer = null;
      this.flush();
    });
  }
}
