import { ScreenDefinitionError, UnknownScreenError } from "../errors";
import type { Screen, ScreenDefinition } from "../types";
import { DIFFICULTY_SCREEN } from "./difficulty-screen";
import { MANAGEMENT_SCREEN } from "./management-screen";
import { compileScreen } from "./screen-compiler";

/**
 * Read-only lookup of compiled screens. Every table is compiled in the
 * constructor, so formula and table errors surface at startup.
 */
export class ScreenRegistry {
  private readonly screens = new Map<string, Screen>();

  constructor(definitions: readonly ScreenDefinition[]) {
    for (const definition of definitions) {
      if (this.screens.has(definition.id)) {
        throw new ScreenDefinitionError(definition.id, "screen registered twice");
      }
      this.screens.set(definition.id, compileScreen(definition));
    }
  }

  get(screenId: string): Screen {
    const screen = this.screens.get(screenId);
    if (!screen) {
      throw new UnknownScreenError(screenId);
    }
    return screen;
  }

  has(screenId: string): boolean {
    return this.screens.has(screenId);
  }

  /**
   * Registered screens in registration order.
   */
  list(): Screen[] {
    return Array.from(this.screens.values());
  }
}

export const createDefaultScreenRegistry = (): ScreenRegistry =>
  new ScreenRegistry([DIFFICULTY_SCREEN, MANAGEMENT_SCREEN]);
