import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { ConfigError, loadConfig, parseConfig, parseConfigText } from "../loader";

const SHIPPED_CONFIG = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../config/default.yaml");

function configErrorOf(raw: unknown): ConfigError {
  try {
    parseConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("expected a ConfigError");
}

describe("parseConfig", () => {
  it("fills every field from defaults for an empty document", () => {
    const config = parseConfig(undefined);

    expect(config.browser).toEqual({
      type: "chromium",
      headless: false,
      defaultTimeoutMs: 30000,
      navigationTimeoutMs: 60000,
      viewport: { width: 1280, height: 720 },
      openDevtools: false,
      slowMoMs: 0,
    });
    expect(config.query.url).toBe("https://zxgk.court.gov.cn/zhzxgk/");
    expect(config.query.captcha.maxAttempts).toBe(100);
    expect(config.query.navigation.maxRetries).toBe(5);
    expect(config.records).toEqual({ idColumn: "身份证号码", nameColumn: "姓名", outputDir: "output" });
    expect(config.pipeline.record.map(step => step.kind)).toEqual(["solveCaptcha", "fillAndSubmit", "extractResult"]);
    expect(config.pipeline.setup[1]).toEqual({
      kind: "waitForReady",
      retry: { maxRetries: 3, retryDelayMs: 2000, backoff: 1 },
    });
  });

  it("merges partial sections with their defaults", () => {
    const config = parseConfig({ browser: { headless: true }, query: { captcha: { minLength: 5 } } });

    expect(config.browser.headless).toBe(true);
    expect(config.browser.type).toBe("chromium");
    expect(config.query.captcha.minLength).toBe(5);
    expect(config.query.captcha.refreshDelayMaxMs).toBe(5000);
  });

  it("fills retry defaults for configured steps", () => {
    const config = parseConfig({
      pipeline: {
        setup: [{ kind: "navigate" }],
        record: [{ kind: "solveCaptcha", retry: { maxRetries: 2 } }, { kind: "fillAndSubmit" }, { kind: "extractResult" }],
      },
    });

    expect(config.pipeline.record[0].retry).toEqual({ maxRetries: 2, retryDelayMs: 0, backoff: 1 });
  });

  it("lists every offending path", () => {
    const error = configErrorOf({ browser: { type: "netscape" }, query: { navigation: { maxRetries: 0 } } });

    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^browser\.type: /);
    expect(error.issues[1]).toMatch(/^query\.navigation\.maxRetries: /);
    expect(error.message.startsWith("Invalid configuration:\n  - browser.type: ")).toBe(true);
  });

  it("rejects unknown step kinds and malformed pipelines", () => {
    expect(() =>
      parseConfig({ pipeline: { setup: [{ kind: "login" }], record: [{ kind: "extractResult" }] } })
    ).toThrow(ConfigError);
    expect(() =>
      parseConfig({ pipeline: { setup: [], record: [{ kind: "extractResult" }] } })
    ).toThrow('record step "extractResult" must come after "fillAndSubmit"');
  });

  it("rejects an inverted refresh delay range", () => {
    expect(() =>
      parseConfig({ query: { captcha: { refreshDelayMinMs: 6000, refreshDelayMaxMs: 5000 } } })
    ).toThrow("refreshDelayMinMs must not exceed refreshDelayMaxMs");
  });
});

describe("parseConfigText", () => {
  it("parses YAML", () => {
    const config = parseConfigText("ocr:\n  endpoint: http://localhost:7000/ocr\n");

    expect(config.ocr).toEqual({ endpoint: "http://localhost:7000/ocr", timeoutMs: 10000 });
  });

  it("reports unparseable YAML as a ConfigError", () => {
    expect(() => parseConfigText("browser: [unclosed", "broken.yaml")).toThrow(/^Cannot parse broken\.yaml: /);
  });
});

describe("loadConfig", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("returns defaults without a path", async () => {
    await expect(loadConfig()).resolves.toEqual(parseConfig(undefined));
  });

  it("returns defaults when the file does not exist", async () => {
    const config = await loadConfig(path.join(os.tmpdir(), "no-such-dir", "config.yaml"));

    expect(config).toEqual(parseConfig(undefined));
  });

  it("reads a file from disk", async () => {
    dir = mkdtempSync(path.join(os.tmpdir(), "config-"));
    const file = path.join(dir, "config.yaml");
    writeFileSync(file, "records:\n  outputDir: results\n");

    const config = await loadConfig(file);

    expect(config.records.outputDir).toBe("results");
  });

  it("ships a sample file equal to the defaults", async () => {
    await expect(loadConfig(SHIPPED_CONFIG)).resolves.toEqual(parseConfig(undefined));
  });
});
