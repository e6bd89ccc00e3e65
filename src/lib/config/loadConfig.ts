import { z } from "zod";
import { AnalysisError } from "../errors/analysisError";

export const DEFAULT_INPUT_DIR = "./data";
export const DEFAULT_OUTPUT_DIR = "./output";

const configSchema = z
  .object({
    inputDir: z.string().trim().min(1, "input directory must not be empty"),
    outputDir: z.string().trim().min(1, "output directory must not be empty")
  })
  .strict();

export type PipelineConfig = z.infer<typeof configSchema>;

/**
 * Positional arguments win over `METRO_INPUT_DIR` / `METRO_OUTPUT_DIR`, which
 * win over the defaults.
 */
export const loadConfig = (
  argv: readonly string[],
  env: Record<string, string | undefined>
): PipelineConfig => {
  const flags = argv.filter((arg) => arg.startsWith("-"));
  if (flags.length > 0) {
    throw new AnalysisError("InvalidConfig", `Unknown option(s): ${flags.join(", ")}.`);
  }
  if (argv.length > 2) {
    throw new AnalysisError(
      "InvalidConfig",
      "Expected at most two arguments: <input-dir> [output-dir]."
    );
  }

  const [inputArg, outputArg] = argv;
  const parsed = configSchema.safeParse({
    inputDir: inputArg ?? env.METRO_INPUT_DIR ?? DEFAULT_INPUT_DIR,
    outputDir: outputArg ?? env.METRO_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR
  });
  if (!parsed.success) {
    throw new AnalysisError(
      "InvalidConfig",
      "Invalid configuration.",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    );
  }
  return parsed.data;
};
