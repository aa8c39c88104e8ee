/**
 * devroute
 *
 * Development-server request router. An ordered list of proxy rules decides
 * per request whether it is forwarded to a backend (optionally with its
 * path rewritten) or falls through to the next handler.
 *
 * @packageDocumentation
 */

// Request pipeline
export { buildForwardRequest, createProxyMiddleware, isUpgradeRequest } from "./proxy.js";
export type { ProxyMiddlewareOptions } from "./proxy.js";
export { httpForwarder } from "./forward.js";
export type {
  DevRequest,
  DevResponse,
  Forwarder,
  Handler,
  Logger,
  Middleware,
  ProxyRuleEntry,
  RewriteValue,
} from "./types.js";

// Rules
export {
  createProxyRule,
  createRuleSet,
  describeRule,
  getRewrittenPath,
  matchesRule,
  resolveRule,
} from "./rules.js";
export type { PrefixRule, ProxyRule, RegexRule, RuleSet } from "./rules.js";
export { RewriteSyntaxError, applyRewrite, compileRewrite } from "./rewrite.js";
export type { Rewrite } from "./rewrite.js";
export { normalizePath } from "./utils.js";

// Dev server
export {
  composeMiddleware,
  createDevServer,
  createHeadersMiddleware,
  createNotFoundHandler,
  toRequestListener,
} from "./server.js";
export type { DevServerOptions } from "./server.js";
export { ConfigError, describeConfig, loadDevConfig, parseDevConfig } from "./config.js";
export type { ConfigOverrides, DevConfig } from "./config.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
