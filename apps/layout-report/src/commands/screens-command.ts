import { Command } from "commander";
import type { CliContext } from "../cli-context";

export function createScreensCommand(context: CliContext): Command {
  return new Command("screens")
    .description("List registered screens")
    .action(() => {
      for (const screen of context.registry.list()) {
        context.write(`${screen.id} (${screen.widgets.length} widgets)`);
      }
    });
}
