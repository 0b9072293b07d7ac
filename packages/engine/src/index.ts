// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export {
  contentTypeEquals,
  formatContentType,
  OCTET_STREAM,
  parseContentType,
  parseRequestHeaderName,
  RequestHeaders,
  RESPONSE_HEADER_PREFIX,
  TEXT_PLAIN,
} from "./http/headers.js";
export type {
  HttpRequestParseErrorCode,
  ParseHttpRequestOptions,
  RequestLine,
} from "./http/request-parser.js";
export {
  createHttpRequestParser,
  formatRequestLine,
  HttpRequestParseError,
  HttpRequestStreamParser,
  parseHttpRequest,
  parseRequest,
  parseRequestLine,
} from "./http/request-parser.js";
export {
  binaryResponse,
  emptyResponse,
  encodeResponse,
  sendResponse,
  textResponse,
} from "./http/response-writer.js";
export type {
  ContentType,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpVersion,
  RequestHeaderName,
  ResponseHeaderName,
  StatusCode,
} from "./http/types.js";
export { HTTP_METHODS, HTTP_VERSIONS, STATUS_TEXT } from "./http/types.js";
// Interfaces
export type {
  FileOpenMode,
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export { FileExistsError, readToEnd, writeAll } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { LogEntry, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  LogStore,
  prefixedLogger,
  storeLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type { RouterOptions } from "./server/router.js";
export {
  checkVersion,
  isContainedFileName,
  pathRemainder,
  Router,
} from "./server/router.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
