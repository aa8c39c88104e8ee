import type { Logger, RewriteValue } from "./types.js";
import { errorMessage } from "./utils.js";

/** Separator between the pattern and the replacement in a template rewrite. */
export const REWRITE_SEPARATOR = "->";

/**
 * A compiled path rewrite. Plain data, evaluated by `applyRewrite`.
 *
 * - `none`: identity
 * - `strip-prefix`: remove the first occurrence of the rule key
 * - `template`: replace every match of `pattern` with `template`, where
 *   `$0`..`$n` stand for the match and its capture groups
 */
export type Rewrite =
  | { kind: "none" }
  | { kind: "strip-prefix"; key: string }
  | { kind: "template"; pattern: RegExp; template: string; groupCount: number };

export const NO_REWRITE: Rewrite = Object.freeze({ kind: "none" });

/**
 * Thrown when the pattern half of a `"<regex>-><replacement>"` rewrite is
 * not a valid regular expression.
 */
export class RewriteSyntaxError extends Error {
  readonly rewrite: string;

  constructor(rewrite: string, cause: unknown) {
    super(`Invalid rewrite pattern in "${rewrite}": ${errorMessage(cause)}`, { cause });
    this.name = "RewriteSyntaxError";
    this.rewrite = rewrite;
  }
}

/** Number of capture groups in a regular expression source. */
function countGroups(source: string): number {
  const match = new RegExp(`${source}|`).exec("");
  return match ? match.length - 1 : 0;
}

/**
 * Compile the raw `rewrite` value of a proxy entry.
 *
 * A malformed template (anything other than exactly one `->`) is reported
 * to `logger` and compiles to `none`. A template whose pattern does not
 * compile throws RewriteSyntaxError.
 */
export function compileRewrite(
  ruleKey: string,
  raw: RewriteValue | undefined,
  logger: Logger
): Rewrite {
  if (raw === true) {
    return { kind: "strip-prefix", key: ruleKey };
  }
  if (typeof raw !== "string" || raw === "") {
    return NO_REWRITE;
  }

  const parts = raw.split(REWRITE_SEPARATOR);
  if (parts.length !== 2) {
    logger.warn(
      `Invalid rewrite rule format "${raw}" for "${ruleKey}". ` +
        `Expected 'regex -> replacement'. Ignoring rewrite.`
    );
    return NO_REWRITE;
  }

  const source = parts[0].trim();
  let pattern: RegExp;
  try {
    pattern = new RegExp(source, "g");
  } catch (err: unknown) {
    throw new RewriteSyntaxError(raw, err);
  }
  return { kind: "template", pattern, template: parts[1].trim(), groupCount: countGroups(source) };
}

/** Substitute `$0`..`$n` in `template`, lowest index first. */
function expandTemplate(template: string, groups: readonly unknown[], groupCount: number): string {
  let result = template;
  for (let i = 0; i <= groupCount; i++) {
    const group = groups[i];
    result = result.split(`$${i}`).join(typeof group === "string" ? group : "");
  }
  return result;
}

/** Apply a compiled rewrite to a path. The result is not normalized. */
export function applyRewrite(rewrite: Rewrite, path: string): string {
  switch (rewrite.kind) {
    case "none":
      return path;
    case "strip-prefix":
      return path.replace(rewrite.key, "");
    case "template":
      return path.replace(rewrite.pattern, (...groups: unknown[]) =>
        expandTemplate(rewrite.template, groups, rewrite.groupCount)
      );
  }
}
