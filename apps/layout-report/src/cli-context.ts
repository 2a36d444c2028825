import type { ScreenRegistry } from "@screen-layout/layout";
import type { Logger } from "@screen-layout/shared-node";
import type { AppConfig } from "./app-config";

/**
 * Dependencies handed to every command factory.
 */
export interface CliContext {
  registry: ScreenRegistry;
  config: AppConfig;
  logger: Logger;
  write: (line: string) => void;
  setExitCode: (code: number) => void;
}
