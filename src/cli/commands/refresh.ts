import { cliLogger } from "../../logger.js";
import { withCore } from "../utils/core.js";

import type { Command } from "commander";

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export function registerRefreshCommand(program: Command): void {
  program
    .command("refresh")
    .description(
      "Re-sync the rolling school-data window on an interval until interrupted"
    )
    .action(async () => {
      await withCore("Starting refresher...", async (core, spinner) => {
        core.startRefresher();
        spinner.succeed(
          `Refreshing every ${String(core.config.refresh.intervalMs / 60_000)} min (Ctrl+C to stop)`
        );

        const signal = await waitForShutdownSignal();
        cliLogger.info({ signal }, "Shutting down refresher");
      });
    });
}
