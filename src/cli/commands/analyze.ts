import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { LearningEngine } from "../../engine/engine.js";
import { errorMessage, formatAnalysis } from "../format.js";

export class AnalyzeCommand extends Command {
  static override paths = [["analyze"]];

  static override usage = Command.Usage({
    description: "Analyze a piece of text without recording it",
    examples: [["Analyze a message", "learnloop analyze I love playing guitar"]],
  });

  json = Option.Boolean("--json", false, { description: "Print the analysis as JSON" });

  words = Option.Rest({ required: 1 });

  async execute(): Promise<void> {
    try {
      const config = loadConfig();
      const engine = new LearningEngine(config.learning);
      const analysis = engine.analyze(this.words.join(" "));
      this.context.stdout.write(
        this.json ? JSON.stringify(analysis, null, 2) + "\n" : formatAnalysis(analysis),
      );
    } catch (err) {
      this.context.stdout.write(`Analysis failed: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
