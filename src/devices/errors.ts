// ---------------------------------------------------------------------------
// Archive API errors
// ---------------------------------------------------------------------------

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export class ArchiveHttpError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly method: HttpMethod;
  readonly url: string;
  readonly body: string;

  constructor(params: {
    status: number;
    statusText: string;
    method: HttpMethod;
    url: string;
    body: string;
  }) {
    super(`HTTP Error ${params.status}: ${params.statusText || "Unknown Status"}`);
    this.name = "ArchiveHttpError";
    this.status = params.status;
    this.statusText = params.statusText;
    this.method = params.method;
    this.url = params.url;
    this.body = params.body;
  }
}

/** The request never produced a response (DNS, refused connection, transport timeout). */
export class ArchiveConnectionError extends Error {
  readonly method: HttpMethod;
  readonly url: string;

  constructor(method: HttpMethod, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${method} ${url} failed: ${reason}`, { cause });
    this.name = "ArchiveConnectionError";
    this.method = method;
    this.url = url;
  }
}
