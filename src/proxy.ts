import type { IncomingHttpHeaders } from "node:http";
import { getRewrittenPath, resolveRule } from "./rules.js";
import type { RuleSet } from "./rules.js";
import type { DevRequest, Forwarder, Logger, Middleware } from "./types.js";
import { errorMessage, normalizePath } from "./utils.js";

export interface ProxyMiddlewareOptions {
  /** Ordered rules; the first match wins. */
  rules: RuleSet;
  /** Performs the network call for matched requests. */
  forward: Forwarder;
  logger: Logger;
}

/** Join a header that may have been sent more than once into a single value. */
function headerValue(headers: IncomingHttpHeaders, name: string): string {
  const value = headers[name];
  return Array.isArray(value) ? value.join(",") : (value ?? "");
}

/**
 * Whether the request asks for a WebSocket connection upgrade
 * (`Upgrade: websocket` together with `Connection: ... upgrade ...`).
 */
export function isUpgradeRequest(request: DevRequest): boolean {
  const upgrade = headerValue(request.headers, "upgrade").trim().toLowerCase();
  const connection = headerValue(request.headers, "connection").toLowerCase();
  return upgrade === "websocket" && connection.includes("upgrade");
}

/**
 * Clone `original` into the request sent to the backend. Method, headers,
 * body stream and context are carried over as-is; adjusting transport
 * headers is left to the forwarder.
 */
export function buildForwardRequest(original: DevRequest, finalTargetUrl: URL): DevRequest {
  return {
    method: original.method,
    url: finalTargetUrl,
    headers: { ...original.headers },
    body: original.body,
    context: original.context,
  };
}

/**
 * Create the proxy stage of the handler chain.
 *
 * Requests whose normalized path matches a rule are forwarded to the rule's
 * target, with the path rewritten. Everything else goes to `next`: requests
 * that match nothing, WebSocket upgrades, and requests whose forwarding
 * failed. Failures are logged, never surfaced to the client.
 */
export function createProxyMiddleware(options: ProxyMiddlewareOptions): Middleware {
  const { rules, forward, logger } = options;

  return (next) => async (request) => {
    const requestPath = normalizePath(request.url.pathname);
    const rule = resolveRule(rules, requestPath);
    if (!rule) {
      return next(request);
    }

    if (isUpgradeRequest(request)) {
      logger.warn(`WebSockets are not supported by the proxy: ${requestPath}`);
      return next(request);
    }

    let finalTargetUrl: URL | string = rule.target;
    try {
      const baseUrl = new URL(rule.target);
      const resolved = new URL(getRewrittenPath(rule, requestPath), baseUrl);
      if (!resolved.search) {
        resolved.search = request.url.search;
      }
      finalTargetUrl = resolved;
      return await forward(baseUrl)(buildForwardRequest(request, resolved));
    } catch (err: unknown) {
      logger.error(
        `Proxy error for ${String(finalTargetUrl)}: ${errorMessage(err)}. Allowing fall-through.`
      );
      return next(request);
    }
  };
}
