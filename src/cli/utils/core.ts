import ora, { type Ora } from "ora";

import { loadConfig } from "../../config.js";
import { createCore, type Core } from "../../core.js";
import { errorMessage } from "../../errors.js";
import { cliLogger } from "../../logger.js";

/**
 * Build the core from the environment behind a spinner, run `action`, and
 * always close the core. Failures end the spinner and set a non-zero exit
 * code instead of throwing.
 */
export async function withCore(
  text: string,
  action: (core: Core, spinner: Ora) => Promise<void>
): Promise<void> {
  const spinner = ora(text).start();
  let core: Core | null = null;
  try {
    core = createCore(loadConfig());
    await action(core, spinner);
    if (spinner.isSpinning) {
      spinner.stop();
    }
  } catch (error) {
    cliLogger.debug({ error }, "Command failed");
    spinner.fail(`Failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await core?.close();
  }
}
