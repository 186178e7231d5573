import type { BaseContext } from "clipanion";
import { LearnloopError } from "../../engine/errors.js";
import { openLearning, type LearningContext } from "../../learning/lifecycle.js";
import { errorMessage } from "../format.js";

/**
 * Opens the learning store for one command, closes it afterwards. Domain
 * errors are printed and turn into exit code 1; anything else propagates.
 */
export async function withLearning(
  context: BaseContext,
  fn: (ctx: LearningContext) => Promise<void> | void,
): Promise<void> {
  let ctx: LearningContext;
  try {
    ctx = openLearning();
  } catch (err) {
    context.stdout.write(`Failed to open learning store: ${errorMessage(err)}\n`);
    process.exitCode = 1;
    return;
  }

  try {
    await fn(ctx);
  } catch (err) {
    if (!(err instanceof LearnloopError)) throw err;
    context.stdout.write(`Error: ${err.message}\n`);
    process.exitCode = 1;
  } finally {
    ctx.close();
  }
}
