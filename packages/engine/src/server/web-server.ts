import type { ServerConfig } from "../config/server-config.js";
import {
  createHttpRequestParser,
  HttpRequestParseError,
} from "../http/request-parser.js";
import {
  emptyResponse,
  sendResponse,
  textResponse,
} from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger, filteredLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { Router } from "./router.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
}

export type WebServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
  response: [request: HttpRequest, response: HttpResponse];
};

export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private router: Router;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = filteredLogger(
      this.config.logLevel,
      options.logger ?? basicLogger(),
    );

    this.router = new Router({
      storageRoot: this.config.storageRoot,
      fs: options.fileSystem,
      logger: this.logger,
      restrictToRoot: this.config.restrictToRoot,
    });
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Rejected connection:", err);
          return;
        }
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Connection handler failed:", err);
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  /** One request, one response, then the connection is closed. */
  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const parser = createHttpRequestParser(socket);

    try {
      let request: HttpRequest;
      try {
        request = await parser.readRequest({
          timeoutMs: this.config.requestTimeoutMs,
          maxRequestSize: this.config.maxRequestSize,
        });
      } catch (err) {
        const response = responseForParseFailure(err);
        if (response) {
          this.logger.debug("Rejected request:", err);
          await sendResponse(socket, response);
        }
        return;
      }

      let response: HttpResponse;
      try {
        response = await this.router.handleRequest(request);
      } catch (err) {
        this.logger.error(`Error handling ${request.method} ${request.path}:`, err);
        response = textResponse(500, "Internal Server Error");
      }

      if (!this.config.quiet) {
        const addr = socket.remoteAddress ?? "?";
        this.logger.info(
          `${request.method} ${request.path} ${response.status} - ${addr}`,
        );
      }

      await sendResponse(socket, response);
      this.emit("response", request, response);
    } finally {
      socket.close();
    }
  }
}

/**
 * Response for a request that could not be framed, or null when the peer
 * went away and nothing should be written.
 */
function responseForParseFailure(err: unknown): HttpResponse | null {
  if (!(err instanceof HttpRequestParseError)) {
    return null;
  }

  if (err.code === "IDLE_TIMEOUT" || err.code === "CONNECTION_CLOSED") {
    return null;
  }

  if (err.code === "REQUEST_TIMEOUT") {
    return emptyResponse(400);
  }

  return textResponse(400, err.message);
}
