export class UnboundActionError extends Error {
  constructor(readonly action: string) {
    super(`No key bound to action "${action}"`);
    this.name = "UnboundActionError";
  }
}

export class EmitTimeoutError extends Error {
  constructor(
    readonly key: string,
    readonly timeoutMs: number
  ) {
    super(`Key "${key}" was not accepted within ${timeoutMs}ms`);
    this.name = "EmitTimeoutError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
