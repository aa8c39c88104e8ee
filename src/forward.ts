import * as http from "node:http";
import * as https from "node:https";
import type { DevRequest, DevResponse, Forwarder } from "./types.js";
import { isErrnoException } from "./utils.js";

/** Value appended to the Via header of forwarded requests. */
export const VIA = "1.1 devroute";

/**
 * Hop-by-hop headers describe the client connection, not the message, and
 * are not passed on in either direction.
 */
const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
  "te",
  "trailer",
]);

function stripHopByHop(headers: http.IncomingHttpHeaders): http.OutgoingHttpHeaders {
  const result: http.OutgoingHttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined && !HOP_BY_HOP_HEADERS.has(name)) {
      result[name] = value;
    }
  }
  return result;
}

/** Headers sent to the backend for `request`. */
export function buildUpstreamHeaders(request: DevRequest, baseUrl: URL): http.OutgoingHttpHeaders {
  const headers = stripHopByHop(request.headers);
  headers.host = baseUrl.host;
  const via = request.headers.via;
  headers.via = via ? `${via}, ${VIA}` : VIA;
  return headers;
}

/** Turn a socket-level failure into an error naming the backend. */
function describeFailure(err: Error, baseUrl: URL): Error {
  const reason =
    isErrnoException(err) && err.code === "ECONNREFUSED"
      ? `${baseUrl.host} refused the connection; is the backend running?`
      : `request to ${baseUrl.host} failed: ${err.message}`;
  return new Error(reason, { cause: err });
}

/**
 * Forwarder backed by node:http / node:https. Connects to the base URL's
 * host and sends the request's path and query. Resolves as soon as the
 * backend's response headers arrive; the body is streamed.
 */
export const httpForwarder: Forwarder = (baseUrl) => (request) =>
  new Promise<DevResponse>((resolve, reject) => {
    const options: http.RequestOptions = {
      protocol: baseUrl.protocol,
      // URL keeps IPv6 literals bracketed; the socket layer wants them bare
      hostname: baseUrl.hostname.replace(/^\[|\]$/g, ""),
      port: baseUrl.port || undefined,
      path: `${request.url.pathname}${request.url.search}`,
      method: request.method,
      headers: buildUpstreamHeaders(request, baseUrl),
    };
    const onResponse = (proxyRes: http.IncomingMessage) => {
      resolve({
        status: proxyRes.statusCode ?? 502,
        headers: stripHopByHop(proxyRes.headers),
        body: proxyRes,
      });
    };

    const proxyReq =
      baseUrl.protocol === "https:"
        ? https.request(options, onResponse)
        : http.request(options, onResponse);

    proxyReq.on("error", (err) => reject(describeFailure(err, baseUrl)));

    // Abort the outgoing request if the inbound body fails
    request.body.on("error", (err) => {
      if (!proxyReq.destroyed) {
        proxyReq.destroy(err);
      }
    });

    request.body.pipe(proxyReq);
  });
