import type { LogLevel } from "../logging/logger.js";

export interface ServerConfig {
  /** Port to listen on. Default: 4221 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /**
   * Directory prefix for /files routes. Joined to the request remainder by
   * plain concatenation, so it normally ends with a separator.
   */
  storageRoot: string;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Minimum level passed to the logger. Default: 'info' */
  logLevel: LogLevel;
  /** Max time allowed for receiving a full HTTP request. Default: 5000ms */
  requestTimeoutMs: number;
  /** Max bytes buffered for one request, head and body. Default: 1MB */
  maxRequestSize: number;
  /** Answer 404 for file names that could leave the storage root. Default: false */
  restrictToRoot: boolean;
}

export function defaultConfig(storageRoot: string): ServerConfig {
  return {
    port: 4221,
    host: "127.0.0.1",
    storageRoot,
    quiet: false,
    logLevel: "info",
    requestTimeoutMs: 5000,
    maxRequestSize: 1024 * 1024,
    restrictToRoot: false,
  };
}
