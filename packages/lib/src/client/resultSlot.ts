export type SlotState = "created" | "submitted" | "completed";

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

const PENDING = 0;
const COMPLETED = 1;

/**
 * Single-assignment result cell for one call marshaled onto the host loop.
 *
 * The first `resolve`/`reject` wins; later ones return `false` and change
 * nothing, so duplicate completion signals from the host are harmless.
 *
 * `signal` mirrors completion in shared memory: a worker handed the array can
 * block on it with `Atomics.wait(signal, 0, 0)`.
 */
export class ResultSlot<T> {
  readonly promise: Promise<T>;
  readonly signal = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

  private phase: SlotState = "created";
  private outcome: Outcome<T> | null = null;
  private readonly settle: (outcome: Outcome<T>) => void;

  constructor() {
    let settle: (outcome: Outcome<T>) => void = () => {};
    this.promise = new Promise<T>((resolve, reject) => {
      settle = (outcome) => {
        if (outcome.ok) resolve(outcome.value);
        else reject(outcome.error);
      };
    });
    this.settle = settle;
    // A slot nobody awaits must not surface as an unhandled rejection;
    // awaiting `promise` still observes the error.
    this.promise.catch(() => undefined);
  }

  get state(): SlotState {
    return this.phase;
  }

  isDone(): boolean {
    return this.outcome !== null;
  }

  markSubmitted(): void {
    if (this.phase === "created") this.phase = "submitted";
  }

  resolve(value: T): boolean {
    return this.complete({ ok: true, value });
  }

  reject(error: unknown): boolean {
    return this.complete({ ok: false, error });
  }

  /** Blocks until completion or timeout; `true` once the slot is completed. */
  waitSync(timeoutMs = Infinity): boolean {
    if (Atomics.load(this.signal, 0) === PENDING) Atomics.wait(this.signal, 0, PENDING, timeoutMs);
    return Atomics.load(this.signal, 0) === COMPLETED;
  }

  /** Value of a completed slot; re-throws the captured error as-is. */
  unwrap(): T {
    const outcome = this.outcome;
    if (!outcome) throw new Error("result slot is not completed");
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }

  private complete(outcome: Outcome<T>): boolean {
    if (this.outcome) return false;
    this.outcome = outcome;
    this.phase = "completed";
    Atomics.store(this.signal, 0, COMPLETED);
    Atomics.notify(this.signal, 0);
    this.settle(outcome);
    return true;
  }
}
