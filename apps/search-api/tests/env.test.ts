import { describe, expect, it } from "vitest";
import { parseEnv } from "../src/env.js";

describe("parseEnv", () => {
  it("applies defaults", () => {
    const env = parseEnv({});
    expect(env.PORT).toBe(4100);
    expect(env.NODE_ENV).toBe("development");
    expect(env.RATE_LIMIT_PER_MINUTE).toBe(60);
    expect(env.MATCH_TRANSITIVE).toBe(true);
    expect(env.MAX_PAGE_LIMIT).toBe(100);
    expect(env.OPENAI_API_KEY).toBeUndefined();
  });

  it("coerces numbers and flags", () => {
    const env = parseEnv({ PORT: "8080", MATCH_TRANSITIVE: "false", MATCH_FUZZY_THRESHOLD: "0.7" });
    expect(env.PORT).toBe(8080);
    expect(env.MATCH_TRANSITIVE).toBe(false);
    expect(env.MATCH_FUZZY_THRESHOLD).toBe(0.7);
  });

  it("reports invalid variables by name", () => {
    expect(() => parseEnv({ PORT: "not-a-port" })).toThrow(/^Invalid environment variables: PORT/);
  });
});
