import type { RequestHeaders } from "./headers.js";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export const HTTP_VERSIONS = ["1.0", "1.1"] as const;
export type HttpVersion = (typeof HTTP_VERSIONS)[number];

export type RequestHeaderName =
  | "User-Agent"
  | "Host"
  | "Accept"
  | "Content-Type"
  | "Content-Length";

export type ResponseHeaderName = "Content-Type" | "Content-Length";

export type ContentType =
  | { kind: "text/plain" }
  | { kind: "application/octet-stream" }
  | { kind: "other"; value: string };

export interface HttpRequest {
  method: HttpMethod;
  /** Raw request target, neither decoded nor normalized. */
  path: string;
  version: HttpVersion;
  headers: RequestHeaders;
  /** Absent when the request had no blank line after its headers. */
  body?: Uint8Array;
}

export type StatusCode = 200 | 201 | 400 | 404 | 409 | 500;

export const STATUS_TEXT: Record<StatusCode, string> = {
  200: "OK",
  201: "Created",
  400: "Bad Request",
  404: "Not Found",
  409: "Conflict",
  500: "Internal Server Error",
};

export interface HttpResponse {
  status: StatusCode;
  headers: Array<[ResponseHeaderName, string]>;
  body?: Uint8Array;
}
