export class InputTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`input generation exceeded ${timeoutMs}ms`);
    this.name = "InputTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class DepthExceededError extends Error {
  readonly maxDepth: number;

  constructor(maxDepth: number) {
    super(`generator recursion exceeded depth ${maxDepth}`);
    this.name = "DepthExceededError";
    this.maxDepth = maxDepth;
  }
}

export class DiscardError extends Error {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`no value satisfied the filter after ${attempts} attempts`);
    this.name = "DiscardError";
    this.attempts = attempts;
  }
}
