import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, parseConfig } from "./config";

describe("config", () => {
  it("fills every section with defaults", () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.source.encoding).toBe("win1251");
    expect(DEFAULT_CONFIG.bot.message_limit).toBe(4096);
  });
  it("keeps given values", () => {
    const config = parseConfig({ source: { timeout_ms: 500 } });
    expect(config.source.timeout_ms).toBe(500);
    expect(config.source.n).toBe("700");
  });
  it("rejects messages longer than telegram allows", () => {
    expect(() => parseConfig({ bot: { message_limit: 5000 } })).toThrow();
  });
});
