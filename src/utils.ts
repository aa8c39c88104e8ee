/**
 * Canonicalize a request path for matching: collapse runs of `/`, and make
 * sure the result starts with `/`. The empty string maps to `/`.
 */
export function normalizePath(path: string): string {
  const collapsed = path.replace(/\/+/g, "/");
  return collapsed.startsWith("/") ? collapsed : `/${collapsed}`;
}

/** Type guard for Node.js system errors with an error code. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof (err as Record<string, unknown>).code === "string"
  );
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Escape HTML special characters to prevent XSS.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Format the dev server's URL. Omits the port when it matches the protocol
 * default (80 for HTTP).
 */
export function formatUrl(hostname: string, port: number): string {
  return port === 80 ? `http://${hostname}` : `http://${hostname}:${port}`;
}
