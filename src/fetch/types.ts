import { TransportName } from "../observability/types";

export type { TransportName };

export type TransportHint = TransportName | "auto";

export type FetchFailureReason =
  | "timeout"
  | "connection_error"
  | "blocked"
  | "server_error"
  | "rate_limited"
  | "http_error"
  | "validation_failed"
  | "exhausted_fallbacks"
  | "interrupted";

export interface FetchSuccess {
  ok: true;
  url: string;
  content: string;
  status: number;
  transport: TransportName;
}

export interface FetchFailure {
  ok: false;
  url: string;
  reason: FetchFailureReason;
  detail: string;
  attempts: Array<{ transport: TransportName; reason: FetchFailureReason; detail: string }>;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

export interface TransportPage {
  content: string;
  status: number;
}

export interface PageTransport {
  readonly name: TransportName;
  fetchPage(url: string, signal?: AbortSignal): Promise<TransportPage>;
  close(): Promise<void>;
}

export class FetchError extends Error {
  readonly reason: FetchFailureReason;
  readonly status?: number;

  constructor(reason: FetchFailureReason, message: string, status?: number) {
    super(message);
    this.name = "FetchError";
    this.reason = reason;
    this.status = status;
  }
}

export function throwIfInterrupted(signal: AbortSignal | undefined, url: string): void {
  if (signal?.aborted) {
    throw new FetchError("interrupted", `Fetch interrupted for ${url}`);
  }
}
