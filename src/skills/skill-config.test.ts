import { describe, it, expect } from "vitest";
import { ConfigError } from "../shared/errors.js";
import { findEndpoint, parseSkillConfig, safeParseSkillConfig, serializeSkillConfig } from "./skill-config.js";
import type { SkillConfig } from "./types.js";

const SKILL_CONFIG_TOML = `
auth_ref = "SEARCH_API_KEY"

[[endpoints]]
name = "search"
url = "https://api.search.example/v1/search"
method = "GET"

[endpoints.headers]
Accept = "application/json"
`;

describe("parseSkillConfig", () => {
  it("parses endpoints and the auth reference", () => {
    const config = parseSkillConfig(SKILL_CONFIG_TOML);

    expect(config.auth_ref).toBe("SEARCH_API_KEY");
    expect(config.endpoints[0]).toEqual({
      name: "search",
      url: "https://api.search.example/v1/search",
      method: "GET",
      headers: { Accept: "application/json" },
    });
    expect(config.extra).toEqual({});
  });

  it("defaults the auth reference to null", () => {
    expect(parseSkillConfig('[[endpoints]]\nname = "a"\nurl = "http://x"\nmethod = "POST"\n').auth_ref).toBeNull();
  });

  it("rejects lower-case methods", () => {
    const result = safeParseSkillConfig(SKILL_CONFIG_TOML.replace('"GET"', '"get"'));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.path).toBe("endpoints[0].method");
    }
  });

  it("rejects unknown top-level keys", () => {
    expect(() => parseSkillConfig(`timeout = 5\n${SKILL_CONFIG_TOML}`)).toThrow(ConfigError);
  });

  it("accepts any nested data under extra", () => {
    const config = parseSkillConfig(`
[extra]
retries = 3
regions = ["eu", "us"]

[extra.cache]
enabled = true
ttl_seconds = 300

[[extra.fallbacks]]
url = "https://backup.example"
`);

    expect(config.extra).toEqual({
      retries: 3,
      regions: ["eu", "us"],
      cache: { enabled: true, ttl_seconds: 300 },
      fallbacks: [{ url: "https://backup.example" }],
    });
  });

  it("rejects integers that do not fit in a number", () => {
    const result = safeParseSkillConfig("[extra]\nbig = 9007199254740993\n");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.path).toBe("extra.big");
    }
  });
});

describe("serializeSkillConfig", () => {
  it("round-trips through TOML", () => {
    const config: SkillConfig = {
      endpoints: [
        { name: "search", url: "https://api.search.example/v1/search", method: "GET", headers: { Accept: "application/json" } },
        { name: "index", url: "https://api.search.example/v1/index", method: "PUT", headers: {} },
      ],
      auth_ref: "SEARCH_API_KEY",
      extra: { retries: 3, cache: { enabled: true }, regions: ["eu", "us"] },
    };

    expect(parseSkillConfig(serializeSkillConfig(config))).toEqual(config);
  });

  it("omits an absent auth reference", () => {
    const config: SkillConfig = { endpoints: [], auth_ref: null, extra: {} };
    expect(parseSkillConfig(serializeSkillConfig(config))).toEqual(config);
  });

  it("rejects null inside extra with a ConfigError", () => {
    const extra: SkillConfig["extra"] = JSON.parse('{"a":null,"b":[1,null]}');
    const serialize = () => serializeSkillConfig({ endpoints: [], auth_ref: null, extra });

    expect(serialize).toThrow(ConfigError);
    expect(serialize).toThrow("Invalid skill config: extra.a: Invalid input");
  });
});

describe("findEndpoint", () => {
  it("finds endpoints by name", () => {
    const config = parseSkillConfig(SKILL_CONFIG_TOML);
    expect(findEndpoint(config, "search")?.method).toBe("GET");
    expect(findEndpoint(config, "upload")).toBeUndefined();
  });
});
