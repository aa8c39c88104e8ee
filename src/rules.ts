import { RewriteSyntaxError, applyRewrite, compileRewrite } from "./rewrite.js";
import type { Rewrite } from "./rewrite.js";
import type { Logger, ProxyRuleEntry } from "./types.js";
import { errorMessage, normalizePath } from "./utils.js";

/** Matches paths that start with `prefix` (case-sensitive). */
export interface PrefixRule {
  kind: "prefix";
  prefix: string;
  target: string;
  rewrite: Rewrite;
}

/**
 * Matches paths that contain a match of `pattern` anywhere, even when the
 * pattern is anchored with `^`. Matching uses `matcher`, which is `pattern`
 * with one trailing `/` removed so `^/api/` also matches `/api`.
 */
export interface RegexRule {
  kind: "regex";
  /** The rule key as configured. */
  source: string;
  pattern: RegExp;
  matcher: RegExp;
  target: string;
  rewrite: Rewrite;
}

export type ProxyRule = PrefixRule | RegexRule;

export type RuleSet = readonly ProxyRule[];

/** Build the regex used for matching: the configured one minus a trailing `/`. */
function toMatcher(source: string, pattern: RegExp): RegExp {
  if (!source.endsWith("/")) return pattern;
  try {
    return new RegExp(source.slice(0, -1));
  } catch {
    // Stripping left a dangling escape (e.g. `\/`); match with the original
    return pattern;
  }
}

/**
 * Build a rule from a config key and its entry. Keys starting with `^` are
 * regular expressions; a key that fails to compile is reported to `logger`
 * and treated as a literal prefix instead.
 *
 * @throws {RewriteSyntaxError} when the regex half of a template rewrite
 *   does not compile.
 */
export function createProxyRule(
  key: string,
  config: Omit<ProxyRuleEntry, "key">,
  logger: Logger
): ProxyRule {
  const rewrite = compileRewrite(key, config.rewrite, logger);

  if (key.startsWith("^")) {
    try {
      const pattern = new RegExp(key);
      const rule: RegexRule = {
        kind: "regex",
        source: key,
        pattern,
        matcher: toMatcher(key, pattern),
        target: config.target,
        rewrite,
      };
      return Object.freeze(rule);
    } catch (err: unknown) {
      logger.warn(`Invalid regex pattern "${key}". Treating as string prefix: ${errorMessage(err)}`);
    }
  }

  const rule: PrefixRule = { kind: "prefix", prefix: key, target: config.target, rewrite };
  return Object.freeze(rule);
}

/**
 * Build the immutable, ordered rule set from validated config entries. An
 * entry whose rewrite regex does not compile is dropped with a warning, so
 * its requests are not proxied.
 */
export function createRuleSet(entries: readonly ProxyRuleEntry[], logger: Logger): RuleSet {
  const rules: ProxyRule[] = [];
  for (const entry of entries) {
    try {
      rules.push(createProxyRule(entry.key, { target: entry.target, rewrite: entry.rewrite }, logger));
    } catch (err: unknown) {
      if (!(err instanceof RewriteSyntaxError)) throw err;
      logger.warn(`${err.message}. Ignoring proxy rule "${entry.key}".`);
    }
  }
  return Object.freeze(rules);
}

export function matchesRule(rule: ProxyRule, path: string): boolean {
  switch (rule.kind) {
    case "prefix":
      return path.startsWith(rule.prefix);
    case "regex":
      return rule.matcher.test(path);
  }
}

/** Apply the rule's rewrite (if any) and normalize the result. */
export function getRewrittenPath(rule: ProxyRule, path: string): string {
  return normalizePath(applyRewrite(rule.rewrite, path));
}

/**
 * First rule, in configured order, that matches `path`. Order is the only
 * tie-break: there is no longest-prefix ranking.
 */
export function resolveRule(rules: RuleSet, path: string): ProxyRule | undefined {
  return rules.find((rule) => matchesRule(rule, path));
}

/** One-line summary used in startup output and the not-found page. */
export function describeRule(rule: ProxyRule): string {
  const match = rule.kind === "prefix" ? `prefix: ${rule.prefix}` : `pattern: ${rule.source}`;
  const rewrite = rule.rewrite.kind === "none" ? "no" : "yes";
  return `{${match}, target: ${rule.target}, rewrite: ${rewrite}}`;
}
