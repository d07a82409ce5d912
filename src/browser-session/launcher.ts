// ============================================================================
// PLAYWRIGHT LAUNCHER — Docker-aware browser startup
// ============================================================================

import { chromium, firefox, webkit } from "playwright";
import type { BrowserHandle, BrowserSessionConfig } from "./types";

/** Chromium flags that hide the automation banner and `webdriver` hints. */
const STEALTH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--disable-extensions",
  "--disable-geolocation",
];

const DOCKER_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
];

/**
 * Build the Chromium argument list for the given configuration.
 * Exported for tests; the other engines ignore Chromium flags.
 */
export function buildChromiumArgs(config: BrowserSessionConfig, isDocker: boolean): string[] {
  const { width, height } = config.viewport;
  return [
    ...STEALTH_ARGS,
    ...(isDocker ? DOCKER_ARGS : []),
    ...(config.openDevtools ? ["--auto-open-devtools-for-tabs"] : []),
    `--window-size=${width},${height}`,
  ];
}

/** Launch a local browser with Playwright. */
export async function launchPlaywright(config: BrowserSessionConfig): Promise<BrowserHandle> {
  const executablePath =
    config.executablePath || process.env.CHROME_PATH || process.env.PUPPETEER_EXECUTABLE_PATH;
  const isDocker = !!process.env.CHROME_PATH || process.getuid?.() === 0;

  const engine = config.type === "firefox" ? firefox : config.type === "webkit" ? webkit : chromium;

  console.log(
    `[launchPlaywright] Launching ${config.type} (headless=${config.headless}${executablePath ? `, executable=${executablePath}` : ""})`
  );

  return engine.launch({
    headless: config.headless,
    slowMo: config.slowMoMs,
    ...(executablePath && { executablePath }),
    ...(config.type === "chromium" && {
      args: buildChromiumArgs(config, isDocker),
      chromiumSandbox: isDocker ? false : undefined,
    }),
  });
}
