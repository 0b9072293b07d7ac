import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, indexOfSequence } from "../utils/buffer.js";
import { RequestHeaders } from "./headers.js";
import {
  HTTP_METHODS,
  HTTP_VERSIONS,
  type HttpMethod,
  type HttpRequest,
  type HttpVersion,
} from "./types.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const DEFAULT_MAX_REQUEST_SIZE = 1024 * 1024; // 1MB
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ParseHttpRequestOptions {
  maxRequestSize?: number;
  timeoutMs?: number;
}

export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "REQUEST_TOO_LARGE"
  | "MALFORMED_REQUEST_LINE"
  | "UNSUPPORTED_METHOD"
  | "UNSUPPORTED_VERSION_TOKEN";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

export interface RequestLine {
  method: HttpMethod;
  path: string;
  version: HttpVersion;
}

export function parseRequestLine(line: string): RequestLine {
  const parts = line.trim().split(/\s+/);
  if (parts.length !== 3) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Malformed request line",
    );
  }

  const [methodToken, path, versionToken] = parts;
  const method = HTTP_METHODS.find((candidate) => candidate === methodToken);
  if (!method) {
    throw new HttpRequestParseError(
      "UNSUPPORTED_METHOD",
      `Unsupported method: ${methodToken}`,
    );
  }

  const version = HTTP_VERSIONS.find(
    (candidate) => `HTTP/${candidate}` === versionToken,
  );
  if (!version) {
    throw new HttpRequestParseError(
      "UNSUPPORTED_VERSION_TOKEN",
      `Unsupported protocol version: ${versionToken}`,
    );
  }

  return { method, path, version };
}

export function formatRequestLine(line: RequestLine): string {
  return `${line.method} ${line.path} HTTP/${line.version}`;
}

function splitHead(buffer: Uint8Array, headEnd: number): string[] {
  return decodeToString(buffer.subarray(0, headEnd)).split(/\r?\n/);
}

/**
 * Parse one complete request held in memory.
 *
 * Everything before the first blank line is the head. Without a blank line
 * the whole buffer is the head and the request has no body; bytes after it
 * are the body, kept as-is.
 */
export function parseRequest(buffer: Uint8Array): HttpRequest {
  const separatorIndex = indexOfSequence(buffer, CRLF_CRLF);
  const headEnd = separatorIndex === -1 ? buffer.length : separatorIndex;
  const [requestLine = "", ...headerLines] = splitHead(buffer, headEnd);

  const { method, path, version } = parseRequestLine(requestLine);
  const headers = RequestHeaders.parse(headerLines);
  const body =
    separatorIndex === -1
      ? undefined
      : buffer.slice(separatorIndex + CRLF_CRLF.length);

  return { method, path, version, headers, body };
}

function parseContentLength(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return Number.parseInt(value, 10);
}

/**
 * Number of buffered bytes that make up a complete request, or null while
 * more data is needed. Without a usable Content-Length everything buffered
 * after the head is taken as the body.
 */
function completeRequestLength(
  buffer: Uint8Array,
  maxRequestSize: number,
): number | null {
  const separatorIndex = indexOfSequence(buffer, CRLF_CRLF);
  if (separatorIndex === -1) return null;

  const headerLines = splitHead(buffer, separatorIndex).slice(1);
  const contentLength = parseContentLength(
    RequestHeaders.parse(headerLines).get("Content-Length"),
  );
  const bodyStart = separatorIndex + CRLF_CRLF.length;
  if (contentLength === null) return buffer.length;

  const total = bodyStart + contentLength;
  if (total > maxRequestSize) {
    throw new HttpRequestParseError(
      "REQUEST_TOO_LARGE",
      "Request exceeds the maximum request size",
    );
  }
  return buffer.length >= total ? total : null;
}

export class HttpRequestStreamParser {
  private buffer: Uint8Array = new Uint8Array(0);
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  async readRequest(options?: ParseHttpRequestOptions): Promise<HttpRequest> {
    const maxRequestSize = options?.maxRequestSize ?? DEFAULT_MAX_REQUEST_SIZE;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    while (true) {
      if (this.buffer.length > maxRequestSize) {
        throw new HttpRequestParseError(
          "REQUEST_TOO_LARGE",
          "Request exceeds the maximum request size",
        );
      }

      const length = completeRequestLength(this.buffer, maxRequestSize);
      if (length !== null) {
        return this.take(length);
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.closed) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "CONNECTION_CLOSED",
            "Connection closed",
          );
        }
        // Peer finished sending: frame whatever arrived.
        return this.take(this.buffer.length);
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new HttpRequestParseError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private take(length: number): HttpRequest {
    const raw = this.buffer.subarray(0, length);
    this.buffer = this.buffer.slice(length);
    return parseRequest(raw);
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

export function createHttpRequestParser(
  socket: ITcpSocket,
): HttpRequestStreamParser {
  return new HttpRequestStreamParser(socket);
}

/**
 * Read and parse a single HTTP request from a TCP socket stream.
 */
export function parseHttpRequest(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): Promise<HttpRequest> {
  return createHttpRequestParser(socket).readRequest(options);
}
