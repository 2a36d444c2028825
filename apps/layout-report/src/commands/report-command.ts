import { Command } from "commander";
import type { CliContext } from "../cli-context";
import { buildScreenReport } from "../layout-report";
import { parseItemCount, parsePixels } from "./option-parsers";

interface ReportCommandOptions {
  width?: number;
  height?: number;
  expand?: string[];
  items?: Record<string, number>;
  minGap?: number;
  all?: boolean;
  strict?: boolean;
}

/**
 * Create the `report` command. Report lines go through `context.write`; a
 * structured summary per screen goes to the logger.
 */
export function createReportCommand(context: CliContext): Command {
  const { config, logger, registry } = context;

  return new Command("report")
    .description("Print overlap, overlay coverage and off-surface findings")
    .argument("[screenIds...]", "Screens to analyze (default: all)")
    .option("--width <px>", "Surface width", parsePixels)
    .option("--height <px>", "Surface height", parsePixels)
    .option("-e, --expand <ids...>", "Expanded dropdown ids")
    .option("--items <entries...>", "Item counts as <widgetId>=<count>", parseItemCount)
    .option("--min-gap <px>", "Minimum acceptable gap", parsePixels)
    .option("--all", "Include pairs without findings")
    .option("--strict", "Exit with code 1 when widgets overlap")
    .action((screenIds: string[], options: ReportCommandOptions) => {
      const surface = {
        width: options.width ?? config.surfaceWidth,
        height: options.height ?? config.surfaceHeight,
      };
      const targets =
        screenIds.length > 0
          ? screenIds
          : registry.list().map((screen) => screen.id);

      let overlapping = 0;
      for (const screenId of targets) {
        const report = buildScreenReport(registry, screenId, surface, {
          expandedIds: options.expand,
          itemCounts: options.items,
          minimumGap: options.minGap ?? config.minimumGap,
          defaultLabelHeight: config.defaultLabelHeight,
          includeAll: options.all,
        });

        context.write(`== ${screenId} (${surface.width}x${surface.height})`);
        for (const line of report.lines) {
          context.write(line);
        }

        logger.info(
          {
            screenId,
            ...report.summary,
            covered: report.layout.overlayCoverage.length,
            offSurface: report.layout.offSurfaceIds.length,
          },
          "Layout report",
        );
        overlapping += report.summary.overlapping;
      }

      if (options.strict && overlapping > 0) {
        logger.warn({ overlapping }, "Overlapping widgets found");
        context.setExitCode(1);
      }
    });
}
