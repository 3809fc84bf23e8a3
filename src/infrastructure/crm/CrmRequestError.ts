export type CrmRequestErrorKind =
  | "timeout"
  | "network"
  | "rate_limited"
  | "server_error"
  | "http_status"
  | "invalid_response";

export class CrmRequestError extends Error {
  readonly kind: CrmRequestErrorKind;
  readonly requestUrl: string;
  readonly status?: number;
  readonly retryDelayMs?: number;
  readonly cause?: unknown;
  /** Kept for retriable statuses so the last one can be handed back once retries run out. */
  readonly response?: Response;

  constructor(args: {
    kind: CrmRequestErrorKind;
    message: string;
    requestUrl: string;
    status?: number;
    retryDelayMs?: number;
    cause?: unknown;
    response?: Response;
  }) {
    super(args.message);
    this.name = "CrmRequestError";
    this.kind = args.kind;
    this.requestUrl = args.requestUrl;
    this.status = args.status;
    this.retryDelayMs = args.retryDelayMs;
    this.cause = args.cause;
    this.response = args.response;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isTransientFailure = (err: CrmRequestError): boolean =>
  err.kind === "timeout" || err.kind === "network" || err.kind === "rate_limited" || err.kind === "server_error";
