////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// error handling / assert stuff

export function assert(condition: boolean = true, message: string = "Assertion failed"): asserts condition {
  if (!condition) {
    console.error("Assertion failed:", message);
    throw new Error(message);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
