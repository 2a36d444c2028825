import { Command } from "commander";
import type { CliContext } from "./cli-context";
import { createOrderCommand } from "./commands/order-command";
import { createReportCommand } from "./commands/report-command";
import { createScreensCommand } from "./commands/screens-command";

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name("layout-report")
    .description("Layout and overlap diagnostics for the game screens")
    .version("0.1.0");

  program.addCommand(createScreensCommand(context));
  program.addCommand(createReportCommand(context));
  program.addCommand(createOrderCommand(context));

  return program;
}
