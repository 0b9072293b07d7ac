import { OCTET_STREAM } from "../http/headers.js";
import {
  binaryResponse,
  emptyResponse,
  textResponse,
} from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import {
  FileExistsError,
  type IFileHandle,
  type IFileSystem,
  writeAll,
} from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";

export interface RouterOptions {
  /** Prefix joined to the /files remainder by concatenation. */
  storageRoot: string;
  fs: IFileSystem;
  logger?: Logger;
  /** Reject file names that could leave the storage root. Default: false */
  restrictToRoot?: boolean;
}

type RouteHandler = (request: HttpRequest) => Promise<HttpResponse>;

interface Route {
  method: HttpRequest["method"];
  matches: (path: string) => boolean;
  handler: RouteHandler;
}

/**
 * Everything after the first two segments, rejoined with "/".
 * `/echo/a/b` yields `a/b`.
 */
export function pathRemainder(path: string): string {
  return path.split("/").slice(2).join("/");
}

/**
 * True when a file name stays under the storage root: not empty, not
 * absolute, and free of `..` segments.
 */
export function isContainedFileName(name: string): boolean {
  if (name === "" || name.startsWith("/") || name.startsWith("\\")) {
    return false;
  }
  return !name.split(/[\\/]/).includes("..");
}

/** HTTP/1.0 is parsed but not served. */
export function checkVersion(request: HttpRequest): HttpResponse | null {
  if (request.version === "1.1") return null;
  return textResponse(400, "this server only supports HTTP version 1.1.");
}

export class Router {
  private storageRoot: string;
  private fs: IFileSystem;
  private logger?: Logger;
  private restrictToRoot: boolean;
  private routes: Route[];

  constructor(options: RouterOptions) {
    this.storageRoot = options.storageRoot;
    this.fs = options.fs;
    this.logger = options.logger;
    this.restrictToRoot = options.restrictToRoot ?? false;

    // Checked in order; the first match handles the request.
    this.routes = [
      {
        method: "GET",
        matches: (path) => path === "/",
        handler: async () => emptyResponse(200),
      },
      {
        method: "GET",
        matches: (path) => path.startsWith("/echo/"),
        handler: async (request) => this.handleEcho(request),
      },
      {
        method: "GET",
        matches: (path) => path === "/user-agent",
        handler: async (request) => this.handleUserAgent(request),
      },
      {
        method: "GET",
        matches: (path) => path.startsWith("/files/"),
        handler: (request) => this.handleFileRead(request),
      },
      {
        method: "POST",
        matches: (path) => path.startsWith("/files/"),
        handler: (request) => this.handleFileWrite(request),
      },
    ];
  }

  async handleRequest(request: HttpRequest): Promise<HttpResponse> {
    const rejected = checkVersion(request);
    if (rejected) return rejected;

    const route = this.routes.find(
      (candidate) =>
        candidate.method === request.method && candidate.matches(request.path),
    );
    if (!route) return emptyResponse(404);
    return route.handler(request);
  }

  private handleEcho(request: HttpRequest): HttpResponse {
    return textResponse(200, pathRemainder(request.path));
  }

  private handleUserAgent(request: HttpRequest): HttpResponse {
    const userAgent = request.headers.get("User-Agent");
    if (userAgent === undefined) {
      return emptyResponse(404);
    }
    return textResponse(200, userAgent);
  }

  private async handleFileRead(request: HttpRequest): Promise<HttpResponse> {
    const filePath = this.resolveFilePath(request.path);
    if (filePath === null) return emptyResponse(404);

    let data: Uint8Array;
    try {
      data = await this.fs.readFile(filePath);
    } catch (err) {
      this.logger?.debug(`Could not read ${filePath}:`, err);
      return emptyResponse(404);
    }
    return binaryResponse(200, data, OCTET_STREAM);
  }

  private async handleFileWrite(request: HttpRequest): Promise<HttpResponse> {
    const filePath = this.resolveFilePath(request.path);
    if (filePath === null) return emptyResponse(404);

    if (!request.headers.isContentType(OCTET_STREAM)) {
      return textResponse(400, "unexpected content type");
    }

    if (await this.fs.exists(filePath)) {
      return textResponse(409, "file already exists.");
    }

    if (request.body === undefined) {
      return textResponse(400, "No body provided");
    }

    let handle: IFileHandle;
    try {
      handle = await this.fs.open(filePath, "wx");
    } catch (err) {
      // Another request created the file after the existence check.
      if (err instanceof FileExistsError) {
        return textResponse(409, "file already exists.");
      }
      this.logger?.error(`Failed to create ${filePath}:`, err);
      return textResponse(500, "failed to create file.");
    }

    try {
      try {
        await writeAll(handle, request.body);
      } finally {
        await handle.close();
      }
    } catch (err) {
      this.logger?.error(`Failed to write ${filePath}:`, err);
      await this.discardPartialFile(filePath);
      return textResponse(500, "failed to write to file.");
    }

    return emptyResponse(201);
  }

  /** An upload either lands whole or leaves nothing behind. */
  private async discardPartialFile(filePath: string): Promise<void> {
    try {
      await this.fs.delete(filePath);
    } catch (err) {
      this.logger?.warn(`Failed to remove partial file ${filePath}:`, err);
    }
  }

  private resolveFilePath(path: string): string | null {
    const name = pathRemainder(path);
    if (this.restrictToRoot && !isContainedFileName(name)) {
      this.logger?.warn(`Refusing file name outside storage root: ${name}`);
      return null;
    }
    return this.storageRoot + name;
  }
}
