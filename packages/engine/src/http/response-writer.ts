import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { formatContentType, RESPONSE_HEADER_PREFIX, TEXT_PLAIN } from "./headers.js";
import {
  type ContentType,
  type HttpResponse,
  STATUS_TEXT,
  type StatusCode,
} from "./types.js";

const CRLF = "\r\n";

/** Status line only; empty header block and body. */
export function emptyResponse(status: StatusCode): HttpResponse {
  return { status, headers: [] };
}

export function binaryResponse(
  status: StatusCode,
  body: Uint8Array,
  contentType: ContentType = TEXT_PLAIN,
): HttpResponse {
  return {
    status,
    headers: [
      ["Content-Type", formatContentType(contentType)],
      ["Content-Length", String(body.length)],
    ],
    body,
  };
}

/** Content-Length counts the UTF-8 bytes, not the characters. */
export function textResponse(
  status: StatusCode,
  text: string,
  contentType: ContentType = TEXT_PLAIN,
): HttpResponse {
  return binaryResponse(status, fromString(text), contentType);
}

export function encodeResponse(response: HttpResponse): Uint8Array {
  let head = `HTTP/1.1 ${response.status} ${STATUS_TEXT[response.status]}${CRLF}`;
  for (const [name, value] of response.headers) {
    head += `${RESPONSE_HEADER_PREFIX[name]}${value}${CRLF}`;
  }
  head += CRLF;

  const headBytes = fromString(head);
  return response.body ? concat([headBytes, response.body]) : headBytes;
}

/**
 * Write a complete response over a socket, waiting for the write to be
 * accepted when the socket supports it.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const data = encodeResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(data);
    return;
  }
  socket.send(data);
}
