import type { ScreenDefinition } from "../types";

export const DIFFICULTY_SCREEN_ID = "difficulty";

/**
 * Difficulty selection screen: a single centred column anchored around the
 * vertical midpoint. The option list is declared next to its dropdown; the
 * draw-order resolver moves it to the end while expanded.
 */
export const DIFFICULTY_SCREEN: ScreenDefinition = {
  id: DIFFICULTY_SCREEN_ID,
  title: "Difficulty selection",
  widgets: [
    { id: "title", kind: "label", anchor: "H/4 - 40", labelHeight: 30 },
    { id: "difficultyLabel", kind: "label", anchor: "H/2 - 80" },
    { id: "difficultyButtons", kind: "button-row", anchor: "H/2 - 40", height: 50 },
    { id: "difficultyDescription", kind: "label", anchor: "H/2 - 10" },
    { id: "timeLabel", kind: "label", anchor: "H/2 + 5", labelHeight: 10 },
    { id: "timeDropdown", kind: "dropdown", anchor: "H/2 + 30", height: 40 },
    {
      id: "timeDropdown.options",
      kind: "option-list",
      layer: "overlay",
      owner: "timeDropdown",
      anchor: "OWNER_BOTTOM",
      options: { count: 4, rowHeight: 30, maxVisible: 5 },
    },
    { id: "confirmButton", kind: "button", anchor: "H/2 + 100", height: 50 },
    { id: "backButton", kind: "button", anchor: "20", height: 40 },
  ],
};
