/**
 * Orchestration public API
 */

export { runCli } from "./cli";
export type { CliDeps } from "./cli";
export { runScrape, reportUnwrittenRows } from "./runner";
export type { RunDeps } from "./runner";
export {
  buildRunConfig,
  expandHome,
  parseIntegerEnv,
  parseExperienceLevels,
} from "./runConfig";
export type { RunEnv, BuildRunConfigOptions } from "./runConfig";
export { ConfigError } from "./configError";
export { createConsoleReporter, formatStepHeader } from "./progressReport";
