import { describe, expect, it } from "vitest";
import { InvalidLayoutOptionError, InvalidSurfaceSizeError } from "../errors";
import { compileScreen, createDefaultScreenRegistry } from "../screens";
import type { LayoutBox } from "../types";
import { buildLayout } from "./layout-builder";

const registry = createDefaultScreenRegistry();
const SURFACE = { width: 800, height: 600 };

const verticalSpans = (boxes: LayoutBox[]): Record<string, [number, number]> =>
  Object.fromEntries(boxes.map((box) => [box.id, [box.top, box.bottom]]));

describe("buildLayout", () => {
  it("computes difficulty screen boxes at 800x600", () => {
    const boxes = buildLayout(registry.get("difficulty"), SURFACE);

    expect(verticalSpans(boxes)).toEqual({
      title: [110, 140],
      difficultyLabel: [220, 240],
      difficultyButtons: [260, 310],
      difficultyDescription: [290, 310],
      timeLabel: [305, 315],
      timeDropdown: [330, 370],
      "timeDropdown.options": [370, 490],
      confirmButton: [400, 450],
      backButton: [20, 60],
    });
  });

  it("keeps declaration order", () => {
    const screen = registry.get("management");
    const boxes = buildLayout(screen, SURFACE);

    expect(boxes.map((box) => box.id)).toEqual(
      screen.widgets.map((widget) => widget.id),
    );
  });

  it("is deterministic", () => {
    const screen = registry.get("management");
    const options = { itemCounts: { wordList: 40 } };

    expect(buildLayout(screen, SURFACE, options)).toEqual(
      buildLayout(screen, SURFACE, options),
    );
  });

  it("computes management screen boxes and horizontal extents", () => {
    const boxes = buildLayout(registry.get("management"), SURFACE);
    const wordList = boxes.find((box) => box.id === "wordList");
    const deleteButton = boxes.find((box) => box.id === "deleteWordButton");

    expect(verticalSpans(boxes)).toMatchObject({
      title: [40, 100],
      wordCount: [70, 94],
      difficultyCounts: [90, 114],
      inputField: [100, 140],
      difficultyLabel: [130, 154],
      difficultyDropdown: [150, 190],
      "difficultyDropdown.options": [190, 280],
      wordList: [200, 530],
      cancelEditButton: [300, 340],
    });
    expect(wordList).toMatchObject({ left: 50, right: 560, column: "content" });
    expect(deleteButton).toMatchObject({ left: 580, right: 780, column: "side" });
  });

  it("widens a scroll list when its content overflows", () => {
    const screen = registry.get("management");
    const fits = buildLayout(screen, SURFACE, { itemCounts: { wordList: 11 } });
    const overflows = buildLayout(screen, SURFACE, { itemCounts: { wordList: 12 } });

    expect(fits.find((box) => box.id === "wordList")).toMatchObject({
      right: 560,
      scroll: {
        contentHeight: 330,
        viewportHeight: 330,
        scrollbarVisible: false,
        maxScrollOffset: 0,
      },
    });
    expect(overflows.find((box) => box.id === "wordList")).toMatchObject({
      right: 580,
      scroll: {
        contentHeight: 360,
        viewportHeight: 330,
        scrollbarVisible: true,
        maxScrollOffset: 30,
      },
    });
  });

  it("sizes option lists from the visible row count", () => {
    const screen = registry.get("difficulty");
    const many = buildLayout(screen, SURFACE, {
      optionCounts: { "timeDropdown.options": 9 },
    });
    const none = buildLayout(screen, SURFACE, {
      optionCounts: { "timeDropdown.options": 0 },
    });

    expect(many.find((box) => box.id === "timeDropdown.options")).toMatchObject({
      top: 370,
      bottom: 520,
      owner: "timeDropdown",
    });
    expect(none.find((box) => box.id === "timeDropdown.options")).toMatchObject({
      top: 370,
      bottom: 370,
    });
  });

  it("applies the configured default label height", () => {
    const boxes = buildLayout(registry.get("difficulty"), SURFACE, {
      defaultLabelHeight: 24,
    });

    expect(verticalSpans(boxes).difficultyDescription).toEqual([290, 314]);
    expect(verticalSpans(boxes).title).toEqual([110, 140]);
  });

  it("lays out a zero-height surface without clamping", () => {
    const difficulty = buildLayout(registry.get("difficulty"), { width: 0, height: 0 });
    const management = buildLayout(registry.get("management"), { width: 0, height: 0 });

    expect(verticalSpans(difficulty)).toMatchObject({
      title: [-40, -10],
      difficultyLabel: [-80, -60],
      difficultyButtons: [-40, 10],
      difficultyDescription: [-10, 10],
      timeLabel: [5, 15],
      timeDropdown: [30, 70],
      confirmButton: [100, 150],
      backButton: [20, 60],
    });
    expect(management.find((box) => box.id === "wordList")).toMatchObject({
      top: 200,
      bottom: 200,
      left: 50,
      right: 50,
    });
  });

  it("rejects negative or fractional surface sizes", () => {
    const screen = registry.get("difficulty");

    expect(() => buildLayout(screen, { width: 800, height: -1 })).toThrow(
      InvalidSurfaceSizeError,
    );
    expect(() => buildLayout(screen, { width: 800.5, height: 600 })).toThrow(
      "Surface size must be non-negative integers, got 800.5x600.",
    );
  });

  it("rejects negative or fractional default label heights", () => {
    const screen = registry.get("difficulty");

    expect(() =>
      buildLayout(screen, SURFACE, { defaultLabelHeight: -30 }),
    ).toThrow(InvalidLayoutOptionError);
    expect(() =>
      buildLayout(screen, SURFACE, { defaultLabelHeight: 12.5 }),
    ).toThrow('Layout option "defaultLabelHeight" must be a non-negative integer, got 12.5.');
    expect(
      buildLayout(screen, SURFACE, { defaultLabelHeight: 0 }).find(
        (box) => box.id === "difficultyDescription",
      ),
    ).toMatchObject({ top: 290, bottom: 290 });
  });

  it("places overlays declared before their owner", () => {
    const screen = compileScreen({
      id: "test",
      title: "Test",
      widgets: [
        {
          id: "menu.options",
          kind: "option-list",
          layer: "overlay",
          owner: "menu",
          anchor: "OWNER_BOTTOM + 2",
          options: { count: 2, rowHeight: 25, maxVisible: 5 },
        },
        { id: "menu", kind: "dropdown", anchor: "H/3", height: 40 },
      ],
    });

    expect(verticalSpans(buildLayout(screen, { width: 300, height: 300 }))).toEqual({
      "menu.options": [142, 192],
      menu: [100, 140],
    });
  });
});
