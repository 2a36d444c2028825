import type { ScreenDefinition, WidgetDefinition } from "../types";

export const MANAGEMENT_SCREEN_ID = "management";

const SIDE_BUTTON_LEFT = "W - 220";
const SIDE_BUTTON_WIDTH = "200";

const sideButton = (id: string, anchor: string): WidgetDefinition => ({
  id,
  kind: "button",
  column: "side",
  anchor,
  height: 40,
  horizontal: { left: SIDE_BUTTON_LEFT, width: SIDE_BUTTON_WIDTH },
});

/**
 * Word management screen: editing widgets on the left, a fixed column of
 * action buttons on the right.
 */
export const MANAGEMENT_SCREEN: ScreenDefinition = {
  id: MANAGEMENT_SCREEN_ID,
  title: "Word management",
  widgets: [
    { id: "title", kind: "label", anchor: "40", labelHeight: 60 },
    { id: "wordCount", kind: "label", anchor: "70", labelHeight: 24 },
    { id: "difficultyCounts", kind: "label", anchor: "90", labelHeight: 24 },
    { id: "inputField", kind: "text-input", anchor: "100", height: 40 },
    { id: "difficultyLabel", kind: "label", anchor: "130", labelHeight: 24 },
    { id: "difficultyDropdown", kind: "dropdown", anchor: "150", height: 40 },
    {
      id: "difficultyDropdown.options",
      kind: "option-list",
      layer: "overlay",
      owner: "difficultyDropdown",
      anchor: "OWNER_BOTTOM",
      options: { count: 3, rowHeight: 30, maxVisible: 5 },
    },
    {
      id: "wordList",
      kind: "scroll-list",
      anchor: "200",
      height: "H - 270",
      horizontal: { left: "50", width: "W - 290" },
      scroll: { itemHeight: 30, scrollbarReservedWidth: 20 },
    },
    sideButton("backButton", "20"),
    sideButton("addWordButton", "100"),
    sideButton("editWordButton", "150"),
    sideButton("deleteWordButton", "200"),
    sideButton("saveWordButton", "250"),
    sideButton("cancelEditButton", "300"),
  ],
};
