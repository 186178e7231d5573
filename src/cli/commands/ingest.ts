import { Command, Option } from "clipanion";
import { INTERACTION_TYPES, type InteractionType } from "../../engine/types.js";
import { formatAnalysis, formatFact } from "../format.js";
import { withLearning } from "./shared.js";

function parseInteractionType(value: string): InteractionType | null {
  return INTERACTION_TYPES.find((t) => t === value) ?? null;
}

export class IngestCommand extends Command {
  static override paths = [["ingest"]];

  static override usage = Command.Usage({
    description: "Record an interaction and run a learning cycle for the user",
    examples: [
      ["Record a message", "learnloop ingest alice I love playing guitar"],
      ["Record with a timestamp", "learnloop ingest alice --at 2024-03-04T09:15:00Z What time is it?"],
    ],
  });

  at = Option.String("--at", { description: "When the interaction happened (ISO 8601)" });

  type = Option.String("--type", "message", { description: "Interaction type" });

  userId = Option.String({ name: "user" });

  words = Option.Rest({ required: 1 });

  async execute(): Promise<void> {
    const interactionType = parseInteractionType(this.type);
    if (!interactionType) {
      this.context.stdout.write(
        `Unknown interaction type: ${this.type} (expected one of ${INTERACTION_TYPES.join(", ")})\n`,
      );
      process.exitCode = 1;
      return;
    }

    let occurredAt: number | undefined;
    if (this.at !== undefined) {
      occurredAt = Date.parse(this.at);
      if (Number.isNaN(occurredAt)) {
        this.context.stdout.write(`Invalid timestamp: ${this.at}\n`);
        process.exitCode = 1;
        return;
      }
    }

    await withLearning(this.context, async ({ service }) => {
      const outcome = await service.ingest({
        userId: this.userId,
        text: this.words.join(" "),
        interactionType,
        occurredAt,
      });

      let out = `Recorded interaction ${outcome.interactionId} for ${outcome.userId}\n`;
      out += formatAnalysis(outcome.analysis);
      if (outcome.skipped) {
        out += `Not enough history to learn from yet (${outcome.summary.interactionCount} interactions)\n`;
      } else {
        out += `Learned ${outcome.learned.length} new facts, reinforced ${outcome.reinforced.length}\n`;
        for (const fact of outcome.learned) out += `  + ${formatFact(fact)}\n`;
        for (const fact of outcome.reinforced) out += `  ^ ${formatFact(fact)}\n`;
        for (const c of outcome.rejected) out += `  x ${c.category}/${c.key} held back: rejected by the user\n`;
      }
      this.context.stdout.write(out);
    });
  }
}
