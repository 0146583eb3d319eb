/**
 * Console progress reporter (fixed-format CLI output)
 */

import type { ProgressReporter, RunStep } from "@/types";

const RULE = "=".repeat(60);

const STEP_ORDER: readonly RunStep[] = ["auth", "search", "details", "write"];

export function formatStepHeader(step: RunStep, message: string): string {
  return `[${STEP_ORDER.indexOf(step) + 1}/${STEP_ORDER.length}] ${message}`;
}

/**
 * @param write - Output sink, one call per line
 */
export function createConsoleReporter(
  write: (line: string) => void = (line) => console.log(line),
): ProgressReporter {
  return {
    banner(title) {
      write(RULE);
      write(title);
      write(RULE);
    },
    step(step, message) {
      write("");
      write(formatStepHeader(step, message));
    },
    line(message) {
      write(`  ${message}`);
    },
    footer(lines) {
      write("");
      write(RULE);
      for (const line of lines) write(line);
      write(RULE);
    },
  };
}
