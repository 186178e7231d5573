import { Command, Option } from "clipanion";
import { formatHistoryEntry } from "../format.js";
import { withLearning } from "./shared.js";

export class HistoryCommand extends Command {
  static override paths = [["history"]];

  static override usage = Command.Usage({
    description: "List a user's recorded interactions, newest first",
    examples: [
      ["Latest 50 interactions", "learnloop history alice"],
      ["Second page of 20", "learnloop history alice --limit 20 --offset 20"],
    ],
  });

  limit = Option.String("--limit", { description: "Page size (default 50)" });

  offset = Option.String("--offset", { description: "Interactions to skip (default 0)" });

  json = Option.Boolean("--json", false);

  userId = Option.String({ name: "user" });

  async execute(): Promise<void> {
    await withLearning(this.context, ({ service }) => {
      const page = service.listInteractions(
        this.userId,
        this.limit === undefined ? undefined : Number(this.limit),
        this.offset === undefined ? undefined : Number(this.offset),
      );
      if (this.json) {
        this.context.stdout.write(JSON.stringify(page, null, 2) + "\n");
        return;
      }
      if (page.entries.length === 0) {
        this.context.stdout.write(`No interactions recorded for ${this.userId}.\n`);
        return;
      }
      const first = page.offset + 1;
      const last = page.offset + page.entries.length;
      let out = `Showing ${first}-${last} of ${page.total} interactions for ${this.userId}\n`;
      out += page.entries.map((e) => formatHistoryEntry(e) + "\n").join("");
      this.context.stdout.write(out);
    });
  }
}
