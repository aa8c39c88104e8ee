import * as http from "node:http";
import type { Duplex } from "node:stream";
import type { DevConfig } from "./config.js";
import { httpForwarder } from "./forward.js";
import { createProxyMiddleware } from "./proxy.js";
import { createRuleSet, describeRule } from "./rules.js";
import type { RuleSet } from "./rules.js";
import type { DevRequest, DevResponse, Forwarder, Handler, Logger, Middleware } from "./types.js";
import { errorMessage, escapeHtml } from "./utils.js";

export interface DevServerOptions {
  config: Pick<DevConfig, "headers" | "proxy">;
  logger: Logger;
  /** Defaults to the node:http forwarder. */
  forward?: Forwarder;
  /** Handler for requests that are not proxied. Defaults to a 404 page. */
  fallback?: Handler;
}

/** Chain middlewares around `handler`; the first middleware is the outermost. */
export function composeMiddleware(...middlewares: Middleware[]): Middleware {
  return (handler) => middlewares.reduceRight((next, middleware) => middleware(next), handler);
}

/** Add the configured headers to every response that does not set them already. */
export function createHeadersMiddleware(headers: Readonly<Record<string, string>>): Middleware {
  const entries = Object.entries(headers);

  return (next) => async (request) => {
    const response = await next(request);
    if (entries.length === 0) return response;

    const merged: http.OutgoingHttpHeaders = { ...response.headers };
    const present = new Set(Object.keys(merged).map((name) => name.toLowerCase()));
    for (const [name, value] of entries) {
      if (!present.has(name.toLowerCase())) {
        merged[name.toLowerCase()] = value;
      }
    }
    return { ...response, headers: merged };
  };
}

/** Terminal handler: a 404 page listing the configured proxy rules. */
export function createNotFoundHandler(rules: RuleSet): Handler {
  return async (request) => {
    const safePath = escapeHtml(request.url.pathname);
    const body = `
      <html>
        <head><title>devroute - Not Found</title></head>
        <body style="font-family: system-ui; padding: 40px; max-width: 600px; margin: 0 auto;">
          <h1>Not Found</h1>
          <p>Nothing is served at <strong>${safePath}</strong></p>
          ${
            rules.length > 0
              ? `
            <h2>Proxy rules:</h2>
            <ul>
              ${rules.map((rule) => `<li><code>${escapeHtml(describeRule(rule))}</code></li>`).join("")}
            </ul>
          `
              : "<p><em>No proxy rules configured.</em></p>"
          }
        </body>
      </html>
    `;
    return { status: 404, headers: { "content-type": "text/html" }, body };
  };
}

/**
 * Wrap a Node request in a DevRequest. Origin-form targets (`/path`) are
 * joined onto the Host header verbatim so repeated slashes survive for the
 * path normalizer. Throws when the Host header does not form a valid URL.
 */
export function toDevRequest(req: http.IncomingMessage): DevRequest {
  const origin = `http://${req.headers.host || "localhost"}`;
  const target = req.url ?? "/";
  return {
    method: req.method ?? "GET",
    url: target.startsWith("/") ? new URL(`${origin}${target}`) : new URL(target, origin),
    headers: req.headers,
    body: req,
    context: {},
  };
}

function sendResponse(res: http.ServerResponse, response: DevResponse, logger: Logger): void {
  res.writeHead(response.status, response.headers);
  const { body } = response;
  if (body === undefined) {
    res.end();
    return;
  }
  if (typeof body === "string" || body instanceof Uint8Array) {
    res.end(body);
    return;
  }

  // Stop reading the upstream body if the client disconnects
  res.on("close", () => {
    if (!body.readableEnded) {
      body.destroy();
    }
  });
  body.on("error", (err) => {
    logger.error(`Response stream failed: ${err.message}`);
    res.destroy(err);
  });
  body.pipe(res);
}

/** Adapt a handler chain to Node's `(req, res)` request listener. */
export function toRequestListener(
  handler: Handler,
  logger: Logger
): (req: http.IncomingMessage, res: http.ServerResponse) => void {
  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    let request: DevRequest;
    try {
      request = toDevRequest(req);
    } catch {
      res.writeHead(400, { "Content-Type": "text/plain" });
      res.end("Bad Request: invalid Host header");
      return;
    }

    try {
      sendResponse(res, await handler(request), logger);
    } catch (err: unknown) {
      logger.error(`Handler failed for ${req.method} ${req.url}: ${errorMessage(err)}`);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "text/plain" });
      }
      res.end("Internal Server Error");
    }
  };

  return (req, res) => {
    void handle(req, res);
  };
}

/**
 * Write a response straight onto a socket. Used for upgrade requests, which
 * Node hands over as a raw socket instead of a ServerResponse.
 */
function writeRawResponse(socket: Duplex, response: DevResponse): void {
  let head = `HTTP/1.1 ${response.status} ${http.STATUS_CODES[response.status] ?? ""}\r\n`;
  for (const [name, value] of Object.entries(response.headers)) {
    if (value === undefined || name.toLowerCase() === "connection") continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      head += `${name}: ${item}\r\n`;
    }
  }
  head += "Connection: close\r\n\r\n";
  socket.write(head);

  const { body } = response;
  if (body === undefined) {
    socket.end();
  } else if (typeof body === "string" || body instanceof Uint8Array) {
    socket.end(body);
  } else {
    body.on("error", () => socket.destroy());
    body.pipe(socket);
  }
}

/**
 * Create the dev server: configured response headers around the proxy
 * stage, which falls through to `fallback`.
 *
 * Upgrade requests run through the same chain (the proxy lets them pass),
 * and whatever the fallback answers is written to the socket before it is
 * closed.
 */
export function createDevServer(options: DevServerOptions): http.Server {
  const { config, logger, forward = httpForwarder } = options;
  const rules = createRuleSet(config.proxy, logger);
  const fallback = options.fallback ?? createNotFoundHandler(rules);

  const handler = composeMiddleware(
    createHeadersMiddleware(config.headers),
    createProxyMiddleware({ rules, forward, logger })
  )(fallback);

  const server = http.createServer(toRequestListener(handler, logger));

  server.on("upgrade", (req: http.IncomingMessage, socket: Duplex) => {
    socket.on("error", () => socket.destroy());
    const respond = async (): Promise<void> => {
      try {
        writeRawResponse(socket, await handler(toDevRequest(req)));
      } catch (err: unknown) {
        logger.error(`Upgrade request failed for ${req.url}: ${errorMessage(err)}`);
        socket.destroy();
      }
    };
    void respond();
  });

  return server;
}
