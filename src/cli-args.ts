// ============================================================================
// CLI ARGUMENTS
// ============================================================================

export interface CliArgs {
  inputPath: string;
  outputPath?: string;
  configPath?: string;
}

export type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; error: string } | { ok: false; help: true };

export const USAGE = `Usage: captcha-query-runner --input <records.xlsx> [--output <results.xlsx>] [--config <config.yaml>]

  --input   Workbook with an ID-number column and a name column (required)
  --output  Result workbook (default: a timestamped file in records.outputDir)
  --config  YAML configuration (default: config/default.yaml when present)
  --help    Show this message`;

const FLAGS: Record<string, keyof CliArgs> = {
  "--input": "inputPath",
  "-i": "inputPath",
  "--output": "outputPath",
  "-o": "outputPath",
  "--config": "configPath",
  "-c": "configPath",
};

/** Accepts `--flag value` and `--flag=value`. */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const values: Partial<CliArgs> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") return { ok: false, help: true };

    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const key = FLAGS[flag];
    if (!key) return { ok: false, error: `Unknown argument: ${arg}` };

    const value = eq > 0 ? arg.slice(eq + 1) : argv[++i];
    if (value === undefined || value === "" || (eq < 0 && value.startsWith("-"))) {
      return { ok: false, error: `Missing value for ${flag}` };
    }
    values[key] = value;
  }

  if (!values.inputPath) return { ok: false, error: "--input is required" };
  return { ok: true, args: { ...values, inputPath: values.inputPath } };
}
