export type SearchErrorCode =
  | "invalid_request"
  | "retrieval_unavailable"
  | "generation_unavailable"
  | "cancelled";

export interface InvalidRequestIssue {
  path: Array<string | number>;
  message: string;
}

export class SearchError extends Error {
  readonly code: SearchErrorCode;

  readonly statusCode: number;

  constructor(code: SearchErrorCode, statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SearchError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidSearchRequestError extends SearchError {
  readonly issues: InvalidRequestIssue[];

  constructor(issues: InvalidRequestIssue[]) {
    super("invalid_request", 422, issues.map((issue) => issue.message).join("; ") || "Invalid search request.");
    this.name = "InvalidSearchRequestError";
    this.issues = issues;
  }
}

export class RetrievalUnavailableError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("retrieval_unavailable", 503, message, options);
    this.name = "RetrievalUnavailableError";
  }
}

export class GenerationUnavailableError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("generation_unavailable", 502, message, options);
    this.name = "GenerationUnavailableError";
  }
}

export class SearchCancelledError extends SearchError {
  constructor(message = "Search request was cancelled.") {
    super("cancelled", 503, message);
    this.name = "SearchCancelledError";
  }
}

export const throwIfCancelled = (signal: AbortSignal | undefined): void => {
  if (signal?.aborted) {
    throw new SearchCancelledError();
  }
};

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return String(error ?? "unknown error");
};
