// ---------------------------------------------------------------------------
// In-process stand-in for the archive's device endpoints
// ---------------------------------------------------------------------------

import type { FetchLike } from "../devices/client.js";

export type RecordedRequest = {
  method: string;
  url: string;
  contentType: string | null;
  body: string | null;
};

export type FakeArchive = {
  fetch: FetchLike;
  /** Stored documents keyed by device name, exactly as written. */
  documents: Map<string, string>;
  requests: RecordedRequest[];
  /** Force the next request with this method to answer with `status`. */
  failNext: (method: string, status: number, statusText?: string) => void;
};

export const FAKE_API_URL = "http://archive.test:8080/dcm4chee-arc/";

function readHeader(headers: RequestInit["headers"], name: string): string | null {
  return new Headers(headers).get(name);
}

export function createFakeArchive(initial: Record<string, string> = {}): FakeArchive {
  const documents = new Map(Object.entries(initial));
  const requests: RecordedRequest[] = [];
  const forced = new Map<string, { status: number; statusText: string }>();

  const fetch: FetchLike = async (url, init) => {
    const method = init.method ?? "GET";
    const body = typeof init.body === "string" ? init.body : null;
    requests.push({
      method,
      url,
      contentType: readHeader(init.headers, "content-type"),
      body,
    });

    const forcedResponse = forced.get(method);
    if (forcedResponse) {
      forced.delete(method);
      return new Response("forced failure", forcedResponse);
    }

    const prefix = `${FAKE_API_URL}devices/`;
    if (!url.startsWith(prefix)) {
      return new Response("no such endpoint", { status: 404, statusText: "Not Found" });
    }
    const name = url.slice(prefix.length);
    const existing = documents.get(name);

    switch (method) {
      case "GET":
        return existing === undefined
          ? new Response(null, { status: 404, statusText: "Not Found" })
          : new Response(existing, {
              status: 200,
              headers: { "Content-Type": "application/json" },
            });
      case "POST":
        if (existing !== undefined) {
          return new Response(null, { status: 409, statusText: "Conflict" });
        }
        documents.set(name, body ?? "");
        return new Response(null, { status: 204, statusText: "No Content" });
      case "PUT":
        if (existing === undefined) {
          return new Response(null, { status: 404, statusText: "Not Found" });
        }
        documents.set(name, body ?? "");
        return new Response(null, { status: 204, statusText: "No Content" });
      case "DELETE":
        if (!documents.delete(name)) {
          return new Response(null, { status: 404, statusText: "Not Found" });
        }
        return new Response(null, { status: 204, statusText: "No Content" });
      default:
        return new Response(null, { status: 405, statusText: "Method Not Allowed" });
    }
  };

  return {
    fetch,
    documents,
    requests,
    failNext: (method, status, statusText = "") => {
      forced.set(method, { status, statusText });
    },
  };
}
