import { Command } from "commander";
import { resolveDrawOrder } from "@screen-layout/layout";
import type { CliContext } from "../cli-context";

interface OrderCommandOptions {
  expand?: string[];
}

export function createOrderCommand(context: CliContext): Command {
  return new Command("order")
    .description("Print the paint order of a screen, one widget id per line")
    .argument("<screenId>", "Screen to resolve")
    .option("-e, --expand <ids...>", "Expanded dropdown ids")
    .action((screenId: string, options: OrderCommandOptions) => {
      const screen = context.registry.get(screenId);
      const order = resolveDrawOrder(screen.widgets, new Set(options.expand ?? []));
      for (const id of order) {
        context.write(id);
      }
    });
}
