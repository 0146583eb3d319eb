/**
 * CLI run: env → config → scrape run → exit code
 */

import type { ProgressReporter } from "@/types";
import * as logger from "@/logger";
import { buildRunConfig, type BuildRunConfigOptions, type RunEnv } from "./runConfig";
import { createConsoleReporter } from "./progressReport";
import { runScrape, type RunDeps } from "./runner";

export type CliDeps = Omit<RunDeps, "reporter"> & {
  reporter?: ProgressReporter;
  configOptions?: BuildRunConfigOptions;
};

/**
 * @returns 0 on success (rows written or nothing to write), 1 on a fatal error
 */
export async function runCli(env: RunEnv, deps: CliDeps = {}): Promise<number> {
  const { reporter = createConsoleReporter(), configOptions, ...runDeps } = deps;

  try {
    const config = buildRunConfig(env, configOptions);
    const summary = await runScrape(config, { ...runDeps, reporter });

    logger.info("Run finished", {
      status: summary.status,
      rows: summary.rows.length,
      failed: summary.failed.length,
    });
    return 0;
  } catch (error) {
    logger.error("Run failed with fatal error", {
      name: error instanceof Error ? error.name : undefined,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
