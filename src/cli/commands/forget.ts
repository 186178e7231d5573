import { Command, Option } from "clipanion";
import { withLearning } from "./shared.js";

export class ForgetCommand extends Command {
  static override paths = [["forget"]];

  static override usage = Command.Usage({
    description: "Erase every interaction and fact held about a user",
    examples: [["Forget a user", "learnloop forget alice"]],
  });

  userId = Option.String({ name: "user" });

  async execute(): Promise<void> {
    await withLearning(this.context, async ({ service }) => {
      const result = await service.forget(this.userId);
      this.context.stdout.write(
        `Forgot ${this.userId}: ${result.interactions} interactions, ${result.facts} facts removed\n`,
      );
    });
  }
}

export class PurgeCommand extends Command {
  static override paths = [["purge"]];

  static override usage = Command.Usage({
    description: "Delete interactions older than the retention window",
    examples: [
      ["Use the configured retention", "learnloop purge"],
      ["Keep only the last 30 days", "learnloop purge --days 30"],
    ],
  });

  days = Option.String("--days", { description: "Retention window in days" });

  async execute(): Promise<void> {
    let override: number | undefined;
    if (this.days !== undefined) {
      override = Number(this.days);
      if (!Number.isInteger(override) || override < 1) {
        this.context.stdout.write(`Invalid --days value: ${this.days}\n`);
        process.exitCode = 1;
        return;
      }
    }

    await withLearning(this.context, ({ config, service }) => {
      const days = override ?? config.privacy.retentionDays;
      const removed = service.purgeExpired(days);
      this.context.stdout.write(`Purged ${removed} interactions older than ${days} days\n`);
    });
  }
}
