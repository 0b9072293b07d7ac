import type {
  ContentType,
  RequestHeaderName,
  ResponseHeaderName,
} from "./types.js";

const REQUEST_HEADER_NAMES: ReadonlyMap<string, RequestHeaderName> = new Map([
  ["user-agent", "User-Agent"],
  ["host", "Host"],
  ["accept", "Accept"],
  ["content-type", "Content-Type"],
  ["content-length", "Content-Length"],
]);

export const RESPONSE_HEADER_PREFIX: Record<ResponseHeaderName, string> = {
  "Content-Type": "Content-Type: ",
  "Content-Length": "Content-Length: ",
};

export const TEXT_PLAIN: ContentType = { kind: "text/plain" };
export const OCTET_STREAM: ContentType = { kind: "application/octet-stream" };

/** Case-insensitive; the raw name is not trimmed. */
export function parseRequestHeaderName(
  raw: string,
): RequestHeaderName | undefined {
  return REQUEST_HEADER_NAMES.get(raw.toLowerCase());
}

export function parseContentType(raw: string): ContentType {
  const value = raw.toLowerCase();
  if (value === "text/plain") return TEXT_PLAIN;
  if (value === "application/octet-stream") return OCTET_STREAM;
  return { kind: "other", value };
}

export function formatContentType(contentType: ContentType): string {
  return contentType.kind === "other" ? contentType.value : contentType.kind;
}

export function contentTypeEquals(a: ContentType, b: ContentType): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === "other" && b.kind === "other") return a.value === b.value;
  return true;
}

/**
 * Recognized request headers in arrival order.
 *
 * Repeated headers are all kept; lookups return the first occurrence.
 */
export class RequestHeaders {
  private readonly pairs: Array<[RequestHeaderName, string]> = [];

  static parse(lines: Iterable<string>): RequestHeaders {
    const headers = new RequestHeaders();
    for (const line of lines) {
      const separator = line.indexOf(": ");
      if (separator === -1) continue;
      const name = parseRequestHeaderName(line.slice(0, separator));
      if (!name) continue;
      headers.pairs.push([name, line.slice(separator + 2).trim()]);
    }
    return headers;
  }

  get(name: RequestHeaderName): string | undefined {
    return this.pairs.find(([key]) => key === name)?.[1];
  }

  contentType(): ContentType | undefined {
    const raw = this.get("Content-Type");
    return raw === undefined ? undefined : parseContentType(raw);
  }

  isContentType(expected: ContentType): boolean {
    const actual = this.contentType();
    return actual !== undefined && contentTypeEquals(actual, expected);
  }

  entries(): Array<[RequestHeaderName, string]> {
    return this.pairs.map(([name, value]) => [name, value]);
  }

  get size(): number {
    return this.pairs.length;
  }
}
