import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http";
import type { Readable } from "node:stream";

/**
 * A request flowing through the handler chain. The proxy middleware clones
 * it into an outbound request whose `url` is the final backend URL.
 */
export interface DevRequest {
  method: string;
  /** Absolute URL. For inbound requests the origin is the dev server's. */
  url: URL;
  /** Lowercased header names, as Node delivers them. */
  headers: IncomingHttpHeaders;
  body: Readable;
  /** Request-scoped metadata, opaque to the proxy and carried through unchanged. */
  context: Readonly<Record<string, unknown>>;
}

export interface DevResponse {
  status: number;
  headers: OutgoingHttpHeaders;
  body?: Readable | string | Uint8Array;
}

export type Handler = (request: DevRequest) => Promise<DevResponse>;

export type Middleware = (next: Handler) => Handler;

/**
 * Performs the network call for a proxied request. Given the rule's base
 * URL it returns a function that sends the outbound request and resolves
 * with the backend's response. May reject on network failure.
 */
export type Forwarder = (baseUrl: URL) => (request: DevRequest) => Promise<DevResponse>;

/** Diagnostic sink injected into every component that reports anomalies. */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/** Raw `rewrite` value of a proxy entry. */
export type RewriteValue = boolean | string;

/** A validated proxy entry as produced by the config loader. */
export interface ProxyRuleEntry {
  /** Literal prefix, or a regular expression source when it starts with `^`. */
  key: string;
  target: string;
  rewrite?: RewriteValue;
}
