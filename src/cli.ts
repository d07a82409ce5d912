#!/usr/bin/env tsx
// ============================================================================
// CLI — query every record in a workbook and write the results
// ============================================================================

import { runQueries } from "./app";
import { CancellationToken } from "./browser-session";
import { loadConfig } from "./config";
import { USAGE, parseCliArgs } from "./cli-args";
import type { TaskStatus } from "./query-task";

const DEFAULT_CONFIG_PATH = "config/default.yaml";

const EXIT_CODES: Record<TaskStatus, number> = {
  success: 0,
  cancelled: 0,
  failed: 1,
};

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    if ("help" in parsed) {
      console.log(USAGE);
      return 0;
    }
    console.error(`${parsed.error}\n\n${USAGE}`);
    return 2;
  }
  const { inputPath, outputPath, configPath } = parsed.args;

  const config = await loadConfig(configPath ?? DEFAULT_CONFIG_PATH);

  const token = new CancellationToken();
  let interrupts = 0;
  const onInterrupt = () => {
    interrupts++;
    if (interrupts > 1) {
      console.log("[cli] Second interrupt, exiting immediately");
      process.exit(130);
    }
    console.log("[cli] Interrupt received, stopping after the current step (Ctrl+C again to force)");
    token.cancel();
  };
  process.on("SIGINT", onInterrupt);
  process.on("SIGTERM", onInterrupt);

  try {
    const result = await runQueries(config, { inputPath, outputPath }, { token });

    const { summary } = result;
    console.log("");
    console.log(`Status:    ${result.status}`);
    console.log(`Succeeded: ${summary.succeeded}/${summary.total} (${(summary.successRate * 100).toFixed(1)}%)`);
    if (summary.failed > 0) console.log(`Failed:    ${summary.failed}`);
    if (summary.stopped > 0) console.log(`Stopped:   ${summary.stopped}`);
    if (result.outputPath) console.log(`Results:   ${result.outputPath}`);
    console.log(result.message);

    return EXIT_CODES[result.status];
  } finally {
    process.off("SIGINT", onInterrupt);
    process.off("SIGTERM", onInterrupt);
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(`[cli] ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
