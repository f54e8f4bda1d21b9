import type { UnitDefinition, UnitExit } from "@stackgate/core";
import { errorMessage } from "@stackgate/core";
import { runExtraction } from "@stackgate/artifacts";
import { createLogger } from "@stackgate/logger";
import type { RunContext, UnitHandle, UnitRunner } from "./runner.js";

const log = createLogger("orchestrator:extract");

/**
 * Runs `extract` units in-process. The unit exits 0 when the environment
 * file was written and 1 on any read, parse or write failure.
 */
export class ExtractRunner implements UnitRunner {
  async launch(unit: UnitDefinition, context: RunContext): Promise<UnitHandle> {
    const run = unit.run;
    if (run.type !== "extract") {
      throw new Error(`ExtractRunner cannot run ${run.type} unit ${unit.name}`);
    }

    log.info(
      `${unit.name} extracting ${run.fields.length} field(s) into ${run.output}` +
        ` (attempt ${context.attempt})`,
    );

    const exited: Promise<UnitExit> = runExtraction(context.store, run).then(
      (report) => {
        if (report.ok) {
          return { code: 0, signal: null };
        }
        const error = `${report.error}: ${report.message}`;
        log.error(`${unit.name} extraction failed (${error})`);
        return { code: 1, signal: null, error };
      },
      (err: unknown) => ({ code: 1, signal: null, error: errorMessage(err) }),
    );

    return {
      pid: null,
      exited,
      // Not interruptible: waits for the extraction to finish.
      stop: async () => {
        await exited;
      },
    };
  }
}
