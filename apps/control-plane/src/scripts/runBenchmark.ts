import { parseBenchmarkArgs, runBenchmarkCommand } from "../benchmarkCli.js";
import { getApiKeys, loadBenchmarkConfig } from "../config.js";

async function run(): Promise<void> {
  const options = parseBenchmarkArgs(process.argv.slice(2));
  const config = loadBenchmarkConfig(options.configPath);
  const runId = await runBenchmarkCommand(options, { config, apiKeys: getApiKeys() });
  if (runId === undefined) {
    process.exitCode = 1;
    return;
  }
  // eslint-disable-next-line no-console
  console.log(`[benchmark] run ${runId} finished; serve results with npm run serve`);
}

run().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
