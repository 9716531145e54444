export function errorMessage(err: unknown): string {
  return (err as { message?: string } | null)?.message ?? String(err);
}

export class HostDeadlockError extends Error {
  constructor(message = "blocking call was not serviced: the host loop runs on the calling thread") {
    super(message);
    this.name = "HostDeadlockError";
  }
}

export class InvalidBufferError extends Error {
  readonly buf: unknown;

  constructor(buf: unknown) {
    super(`invalid buffer handle: ${JSON.stringify(buf)}`);
    this.name = "InvalidBufferError";
    this.buf = buf;
  }
}
