import { createDefaultScreenRegistry, type ScreenRegistry } from "@screen-layout/layout";
import type { Logger } from "@screen-layout/shared-node";
import { loadAppConfig } from "./app-config";
import { createProgram } from "./cli";

export interface RunCliOptions {
  /**
   * Arguments after the executable and script path.
   */
  argv: readonly string[];
  env?: Readonly<Record<string, string | undefined>>;
  /**
   * Created before the config is read, so config errors are logged too.
   */
  logger: Logger;
  registry?: ScreenRegistry;
  write: (line: string) => void;
  setExitCode: (code: number) => void;
}

/**
 * Loads the config and runs one command. Failures are logged and turn into
 * exit code 1.
 */
export const runCli = async (options: RunCliOptions): Promise<void> => {
  const { logger, setExitCode } = options;

  try {
    const config = loadAppConfig(options.env);
    const program = createProgram({
      registry: options.registry ?? createDefaultScreenRegistry(),
      config,
      logger: logger.child({}, { level: config.logLevel }),
      write: options.write,
      setExitCode,
    });
    await program.parseAsync([...options.argv], { from: "user" });
  } catch (error) {
    logger.error({ err: error }, "layout-report failed");
    setExitCode(1);
  }
};
