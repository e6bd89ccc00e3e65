import { loadConfig, type PipelineConfig } from "./lib/config/loadConfig";
import { describeError } from "./lib/errors/analysisError";
import { runPipeline } from "./lib/pipeline/runPipeline";

const reportFailure = (code: string, message: string) => {
  console.error(`[pipeline] failed (${code}): ${message}`);
};

const resolveConfig = (): PipelineConfig | null => {
  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (error) {
    const { code, message } = describeError(error);
    reportFailure(code, message);
    return null;
  }
};

const main = (): number => {
  const config = resolveConfig();
  if (!config) {
    return 1;
  }

  const outcome = runPipeline(config);
  if (!outcome.ok) {
    reportFailure(outcome.error.code, outcome.error.message);
    return 1;
  }
  console.log(`Dashboard written to ${outcome.outputPath}`);
  return 0;
};

process.exitCode = main();
