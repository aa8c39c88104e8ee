import { describe, it, expect, vi } from "vitest";
import {
  createProxyRule,
  createRuleSet,
  describeRule,
  getRewrittenPath,
  matchesRule,
  resolveRule,
} from "./rules.js";
import type { ProxyRule } from "./rules.js";
import { RewriteSyntaxError } from "./rewrite.js";

function createTestLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function rule(key: string, rewrite?: boolean | string): ProxyRule {
  return createProxyRule(key, { target: "http://localhost:8080", rewrite }, createTestLogger());
}

describe("createProxyRule", () => {
  it("creates a prefix rule with no rewrite", () => {
    const created = rule("/api");
    expect(created.kind).toBe("prefix");
    if (created.kind !== "prefix") return;
    expect(created.prefix).toBe("/api");
    expect(created.target).toBe("http://localhost:8080");
    expect(created.rewrite).toEqual({ kind: "none" });
  });

  it("creates a prefix rule with a strip-prefix rewrite", () => {
    const created = rule("/api", true);
    expect(created.kind).toBe("prefix");
    expect(created.rewrite).toEqual({ kind: "strip-prefix", key: "/api" });
    expect(getRewrittenPath(created, "/api/users")).toBe("/users");
    expect(getRewrittenPath(created, "/api/")).toBe("/");
    expect(getRewrittenPath(created, "/other")).toBe("/other");
  });

  it("creates a regex rule for keys starting with ^", () => {
    const created = rule("^/users/(\\d+)");
    expect(created.kind).toBe("regex");
    if (created.kind !== "regex") return;
    expect(created.source).toBe("^/users/(\\d+)");
    expect(created.pattern.test("/users/1")).toBe(true);
    expect(created.rewrite).toEqual({ kind: "none" });
  });

  it("creates a regex rule with a template rewrite", () => {
    const created = createProxyRule(
      "^/users/(\\d+)/profile",
      { target: "http://localhost:8081/user-service", rewrite: "/users/(\\d+)/profile->/users/info" },
      createTestLogger()
    );
    expect(created.kind).toBe("regex");
    expect(getRewrittenPath(created, "/users/456/profile/summary")).toBe("/users/info/summary");
    expect(getRewrittenPath(created, "/users/789/dashboard")).toBe("/users/789/dashboard");
  });

  it("falls back to a prefix rule for an invalid regex key", () => {
    const logger = createTestLogger();
    const created = createProxyRule("^/invalid(", { target: "http://localhost:8082" }, logger);
    expect(created.kind).toBe("prefix");
    if (created.kind !== "prefix") return;
    expect(created.prefix).toBe("^/invalid(");
    expect(created.target).toBe("http://localhost:8082");
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringContaining('Invalid regex pattern "^/invalid(". Treating as string prefix')
    );
  });

  it("keeps the rule without a rewrite when the rewrite pattern is malformed", () => {
    const logger = createTestLogger();
    const created = createProxyRule(
      "/old/",
      { target: "http://localhost:8080", rewrite: "no separator here" },
      logger
    );
    expect(created.rewrite).toEqual({ kind: "none" });
    expect(getRewrittenPath(created, "old//x")).toBe("/old/x");
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("throws when the rewrite pattern does not compile", () => {
    expect(() =>
      createProxyRule("/old/", { target: "http://localhost:8080", rewrite: "/old/(->/new/" }, createTestLogger())
    ).toThrow(RewriteSyntaxError);
  });

  it("returns frozen rules", () => {
    expect(Object.isFrozen(rule("/api/"))).toBe(true);
    expect(Object.isFrozen(rule("^/api/"))).toBe(true);
  });
});

describe("matchesRule", () => {
  describe("prefix rules", () => {
    const prefix = rule("/api");

    it("matches paths starting with the prefix", () => {
      expect(matchesRule(prefix, "/api/users")).toBe(true);
      expect(matchesRule(prefix, "/api")).toBe(true);
    });

    it("does not match other paths", () => {
      expect(matchesRule(prefix, "/app")).toBe(false);
      expect(matchesRule(prefix, "/app/users")).toBe(false);
    });

    it("is case-sensitive", () => {
      expect(matchesRule(prefix, "/ApI/x")).toBe(false);
    });
  });

  describe("regex rules", () => {
    it("matches anywhere in the path, not only the whole path", () => {
      const regex = rule("^/users/(\\d+)");
      expect(matchesRule(regex, "/users/123")).toBe(true);
      expect(matchesRule(regex, "/users/123/profile")).toBe(true);
    });

    it("honours an explicit end anchor", () => {
      const regex = rule("^/users/(\\d+)$");
      expect(matchesRule(regex, "/users/123")).toBe(true);
      expect(matchesRule(regex, "/users/123/profile")).toBe(false);
    });

    it("does not match other paths", () => {
      const regex = rule("^/users/(\\d+)$");
      expect(matchesRule(regex, "/customers/123")).toBe(false);
      expect(matchesRule(regex, "/users/abc")).toBe(false);
    });

    it("ignores a trailing slash in the pattern", () => {
      const regex = rule("^/api/v\\d/");
      expect(matchesRule(regex, "/api/v1")).toBe(true);
      expect(matchesRule(regex, "/api/v2/items")).toBe(true);
    });

    it("finds unanchored patterns in the middle of the path", () => {
      const regex = rule("^.*/assets/");
      expect(matchesRule(regex, "/app/assets/logo.png")).toBe(true);
    });
  });
});

describe("getRewrittenPath", () => {
  it("normalizes the path when there is no rewrite", () => {
    expect(getRewrittenPath(rule("/api"), "/api/users")).toBe("/api/users");
    expect(getRewrittenPath(rule("/api"), "//api///users")).toBe("/api/users");
  });

  it("normalizes the rewritten path", () => {
    expect(getRewrittenPath(rule("/api/", true), "/api/")).toBe("/");
    expect(getRewrittenPath(rule("/api/", true), "/api/users")).toBe("/users");
    expect(getRewrittenPath(rule("/v1/", "/v1/->v2//"), "/v1/items")).toBe("/v2/items");
  });
});

describe("resolveRule", () => {
  it("returns the first matching rule in order", () => {
    const rules = createRuleSet(
      [
        { key: "/api/", target: "http://first.test" },
        { key: "/api/users/", target: "http://second.test" },
      ],
      createTestLogger()
    );
    expect(resolveRule(rules, "/api/users/1")?.target).toBe("http://first.test");
  });

  it("does not prefer longer prefixes", () => {
    const rules = createRuleSet(
      [
        { key: "/api/users/", target: "http://specific.test" },
        { key: "/api/", target: "http://general.test" },
      ],
      createTestLogger()
    );
    expect(resolveRule(rules, "/api/users/1")?.target).toBe("http://specific.test");
    expect(resolveRule(rules, "/api/orders")?.target).toBe("http://general.test");
  });

  it("mixes prefix and regex rules", () => {
    const rules = createRuleSet(
      [
        { key: "^/users/(\\d+)/", target: "http://users.test" },
        { key: "/", target: "http://everything.test" },
      ],
      createTestLogger()
    );
    expect(resolveRule(rules, "/users/42")?.target).toBe("http://users.test");
    expect(resolveRule(rules, "/users/me")?.target).toBe("http://everything.test");
  });

  it("returns undefined when nothing matches", () => {
    const rules = createRuleSet([{ key: "/api/", target: "http://api.test" }], createTestLogger());
    expect(resolveRule(rules, "/static/app.js")).toBeUndefined();
    expect(resolveRule(createRuleSet([], createTestLogger()), "/")).toBeUndefined();
  });
});

describe("createRuleSet", () => {
  it("keeps entry order and freezes the list", () => {
    const rules = createRuleSet(
      [
        { key: "/b/", target: "http://b.test" },
        { key: "/a/", target: "http://a.test", rewrite: true },
      ],
      createTestLogger()
    );
    expect(rules.map((r) => r.target)).toEqual(["http://b.test", "http://a.test"]);
    expect(Object.isFrozen(rules)).toBe(true);
  });

  it("drops an entry whose rewrite pattern does not compile", () => {
    const logger = createTestLogger();
    const rules = createRuleSet(
      [
        { key: "/old/", target: "http://old.test", rewrite: "/old/(->/new/" },
        { key: "/api/", target: "http://api.test" },
      ],
      logger
    );

    expect(rules.map((r) => r.target)).toEqual(["http://api.test"]);
    expect(resolveRule(rules, "/old/x")).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledTimes(1);
    const [message] = logger.warn.mock.calls[0];
    expect(message).toMatch(/^Invalid rewrite pattern in "\/old\/\(->\/new\/": /);
    expect(message).toMatch(/\. Ignoring proxy rule "\/old\/"\.$/);
  });
});

describe("describeRule", () => {
  it("describes prefix rules", () => {
    expect(describeRule(rule("/api"))).toBe(
      "{prefix: /api, target: http://localhost:8080, rewrite: no}"
    );
    expect(describeRule(rule("/api", true))).toBe(
      "{prefix: /api, target: http://localhost:8080, rewrite: yes}"
    );
  });

  it("describes regex rules with their configured source", () => {
    expect(describeRule(rule("^/users/(\\d+)/", "^/users/->/u/"))).toBe(
      "{pattern: ^/users/(\\d+)/, target: http://localhost:8080, rewrite: yes}"
    );
  });
});
