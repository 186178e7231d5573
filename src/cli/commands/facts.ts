import { Command, Option } from "clipanion";
import { FACT_CATEGORIES, type FactCategory } from "../../engine/types.js";
import { formatFact, formatFactStats, formatInsights, formatSummary } from "../format.js";
import { withLearning } from "./shared.js";

export class FactsCommand extends Command {
  static override paths = [["facts"]];

  static override usage = Command.Usage({
    description: "List the facts learned about a user",
    examples: [
      ["List all facts", "learnloop facts alice"],
      ["Only interests, as JSON", "learnloop facts alice --category interest --json"],
      ["With ids, for facts confirm", "learnloop facts alice --ids"],
    ],
  });

  category = Option.String("--category", { description: "Only show one category" });

  ids = Option.Boolean("--ids", false, { description: "Prefix every fact with its id" });

  json = Option.Boolean("--json", false);

  userId = Option.String({ name: "user" });

  async execute(): Promise<void> {
    let category: FactCategory | undefined;
    if (this.category !== undefined) {
      category = FACT_CATEGORIES.find((c) => c === this.category);
      if (!category) {
        this.context.stdout.write(
          `Unknown category: ${this.category} (expected one of ${FACT_CATEGORIES.join(", ")})\n`,
        );
        process.exitCode = 1;
        return;
      }
    }

    await withLearning(this.context, ({ service }) => {
      const { facts } = service.getProfile(this.userId, category);
      if (this.json) {
        this.context.stdout.write(JSON.stringify(facts, null, 2) + "\n");
        return;
      }
      if (facts.length === 0) {
        this.context.stdout.write(`No facts learned for ${this.userId}.\n`);
        return;
      }
      this.context.stdout.write(facts.map((f) => formatFact(f, this.ids) + "\n").join(""));
    });
  }
}

export class FactsConfirmCommand extends Command {
  static override paths = [["facts", "confirm"]];

  static override usage = Command.Usage({
    description: "Confirm a learned fact, or reject it so it stops taking evidence",
    examples: [
      ["Confirm a fact", "learnloop facts confirm alice 3f2b9c1e-0000-4000-8000-000000000000"],
      ["Reject a fact", "learnloop facts confirm alice 3f2b9c1e-0000-4000-8000-000000000000 --reject"],
    ],
  });

  reject = Option.Boolean("--reject", false, { description: "Mark the fact as wrong" });

  userId = Option.String({ name: "user" });

  factId = Option.String({ name: "fact-id" });

  async execute(): Promise<void> {
    await withLearning(this.context, async ({ service }) => {
      const fact = await service.reviewFact(this.userId, this.factId, this.reject ? "rejected" : "confirmed");
      this.context.stdout.write(`${this.reject ? "Rejected" : "Confirmed"} ${formatFact(fact)}\n`);
    });
  }
}

export class PatternsCommand extends Command {
  static override paths = [["patterns"]];

  static override usage = Command.Usage({
    description: "Show the latest behavior summary for a user",
    examples: [["Show patterns", "learnloop patterns alice"]],
  });

  userId = Option.String({ name: "user" });

  async execute(): Promise<void> {
    await withLearning(this.context, ({ service }) => {
      const profile = service.getProfile(this.userId);
      if (!profile.summary) {
        this.context.stdout.write(`No interactions recorded for ${this.userId}.\n`);
        return;
      }
      let out = formatSummary(profile.summary) + formatFactStats(profile.factStats);
      if (profile.insights.length > 0) {
        out += "Insights:\n" + formatInsights(profile.insights);
      }
      this.context.stdout.write(out);
    });
  }
}
