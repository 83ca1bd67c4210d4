import ora, { type Ora } from "ora";
import chalk from "chalk";
import type { ProgressReporter } from "../simulator/runner.js";

export interface SimulationProgress extends ProgressReporter {
  succeed(text: string): void;
  fail(): void;
}

/** Spinner on stderr so stdout keeps only the leveled log lines. */
export function createSimulationProgress(): SimulationProgress {
  let spinner: Ora | null = null;

  return {
    update(text: string) {
      if (spinner) {
        spinner.text = text;
      } else {
        spinner = ora({ text, stream: process.stderr }).start();
      }
    },
    succeed(text: string) {
      const done = spinner ?? ora({ stream: process.stderr });
      done.succeed(chalk.dim(text));
      spinner = null;
    },
    fail() {
      spinner?.fail();
      spinner = null;
    },
  };
}
