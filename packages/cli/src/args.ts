import { isLogLevel, type LogLevel } from "@hearth/engine";

export interface CliArgs {
  directory: string;
  port: number;
  host: string;
  quiet: boolean;
  logLevel: LogLevel;
  maxRequestSize?: number;
  restrictToRoot: boolean;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseInteger(flag: string, raw: string | undefined, min: number): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new CliUsageError(`${flag} expects a whole number`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min) {
    throw new CliUsageError(`${flag} must be at least ${min}`);
  }
  return value;
}

function requireValue(flag: string, raw: string | undefined): string {
  if (raw === undefined || raw.startsWith("-")) {
    throw new CliUsageError(`${flag} expects a value`);
  }
  return raw;
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    directory: ".",
    port: 4221,
    host: "127.0.0.1",
    quiet: false,
    logLevel: "info",
    restrictToRoot: false,
    help: false,
    version: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--directory" || arg === "-d") {
      parsed.directory = requireValue(arg, args[++i]);
    } else if (arg === "--port" || arg === "-p") {
      parsed.port = parseInteger(arg, args[++i], 0);
      if (parsed.port > 65535) {
        throw new CliUsageError("Invalid port number");
      }
    } else if (arg === "--host" || arg === "-H") {
      parsed.host = requireValue(arg, args[++i]);
    } else if (arg === "--quiet" || arg === "-q") {
      parsed.quiet = true;
    } else if (arg === "--log-level") {
      const level = requireValue(arg, args[++i]);
      if (!isLogLevel(level)) {
        throw new CliUsageError(`Unknown log level: ${level}`);
      }
      parsed.logLevel = level;
    } else if (arg === "--max-request-size") {
      parsed.maxRequestSize = parseInteger(arg, args[++i], 1);
    } else if (arg === "--restrict-to-root") {
      parsed.restrictToRoot = true;
    } else if (arg === "--version" || arg === "-v") {
      parsed.version = true;
    } else if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (!arg.startsWith("-")) {
      parsed.directory = arg;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return parsed;
}

/**
 * File routes join the request remainder straight onto the storage root,
 * so the root must end with a separator.
 */
export function toStorageRoot(resolvedDirectory: string, separator: string): string {
  return resolvedDirectory.endsWith(separator)
    ? resolvedDirectory
    : `${resolvedDirectory}${separator}`;
}

export const HELP_TEXT = `
hearth - tiny HTTP/1.1 file drop

Usage: hearth [directory] [options]

Routes:
  GET  /                 200, empty body
  GET  /echo/<value>     echo <value> as text
  GET  /user-agent       echo the User-Agent header
  GET  /files/<name>     download a stored file
  POST /files/<name>     store a new file (Content-Type: application/octet-stream)

Options:
  --directory, -d <dir>     Storage directory for /files (default: .)
  --port, -p <port>         Port to listen on (default: 4221)
  --host, -H <host>         Host to bind (default: 127.0.0.1)
  --quiet, -q               Suppress request logging
  --log-level <level>       debug | info | warn | error (default: info)
  --max-request-size <n>    Max bytes per request (default: 1048576)
  --restrict-to-root        Refuse file names that leave the storage directory
  --version, -v             Show version
  --help, -h                Show this help
`;
