export class RepoInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RepoInputError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class GitHubApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "GitHubApiError";
    this.status = status;
  }

  get isRateLimit(): boolean {
    return this.status === 403 || this.status === 429;
  }

  /** Server-side failures and timeouts are worth another attempt */
  get retryable(): boolean {
    return this.status >= 500 || this.status === 0;
  }
}

export class LlmError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LlmError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
