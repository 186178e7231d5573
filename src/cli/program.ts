import { Cli } from "clipanion";
import { AnalyzeCommand } from "./commands/analyze.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { FactsCommand, FactsConfirmCommand, PatternsCommand } from "./commands/facts.js";
import { ForgetCommand, PurgeCommand } from "./commands/forget.js";
import { HistoryCommand } from "./commands/history.js";
import { IngestCommand } from "./commands/ingest.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Learnloop",
    binaryName: "learnloop",
    binaryVersion: VERSION,
  });

  cli.register(AnalyzeCommand);
  cli.register(IngestCommand);

  // Reading what was learned
  cli.register(FactsCommand);
  cli.register(FactsConfirmCommand);
  cli.register(PatternsCommand);
  cli.register(HistoryCommand);

  // Privacy
  cli.register(ForgetCommand);
  cli.register(PurgeCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
