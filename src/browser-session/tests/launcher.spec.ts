import { describe, it, expect } from "vitest";
import { buildChromiumArgs } from "../launcher";
import { TEST_CONFIG } from "./fake-engine";

describe("buildChromiumArgs", () => {
  it("adds the window size after the stealth flags", () => {
    const args = buildChromiumArgs(TEST_CONFIG, false);

    expect(args[0]).toBe("--disable-blink-features=AutomationControlled");
    expect(args[args.length - 1]).toBe("--window-size=1280,800");
    expect(args).not.toContain("--no-sandbox");
  });

  it("adds container flags when running in Docker", () => {
    const args = buildChromiumArgs(TEST_CONFIG, true);

    expect(args).toContain("--no-sandbox");
    expect(args).toContain("--disable-dev-shm-usage");
  });

  it("opens devtools when requested", () => {
    const args = buildChromiumArgs({ ...TEST_CONFIG, openDevtools: true }, false);

    expect(args).toContain("--auto-open-devtools-for-tabs");
  });
});
