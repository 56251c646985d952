/**
 * Stage at which a metadata or artifact request failed.
 */
export type FetchFailure = "network" | "status" | "decode";

/**
 * Failure of a fetch operation. Covers transport errors, non-success
 * responses, and payloads that do not match the expected shape.
 */
export class FetchError extends Error {
  readonly reason: FetchFailure;
  readonly url: string;
  readonly status?: number;

  constructor(reason: FetchFailure, url: string, message: string, status?: number) {
    super(message);
    this.name = "FetchError";
    this.reason = reason;
    this.url = url;
    this.status = status;
  }
}
