import { describe, expect, it } from "vitest";
import { CommanderError } from "commander";
import { UnknownScreenError } from "@screen-layout/layout";
import { createTestCli } from "./helpers/cli-context";

describe("layout-report CLI", () => {
  it("lists registered screens", async () => {
    const cli = createTestCli();

    await cli.program.parseAsync(["screens"], { from: "user" });

    expect(cli.output).toEqual(["difficulty (9 widgets)", "management (14 widgets)"]);
  });

  it("reports one screen and logs a summary", async () => {
    const cli = createTestCli();

    await cli.program.parseAsync(["report", "difficulty"], { from: "user" });

    expect(cli.output).toEqual([
      "== difficulty (800x600)",
      "difficultyButtons overlaps difficultyDescription by 20px",
      "difficultyButtons overlaps timeLabel by 5px",
      "difficultyDescription overlaps timeLabel by 5px",
    ]);
    expect(cli.entries).toHaveLength(1);
    expect(cli.entries[0]).toMatchObject({
      msg: "Layout report",
      screenId: "difficulty",
      pairs: 28,
      overlapping: 3,
      touching: 0,
      covered: 0,
      offSurface: 0,
    });
    expect(cli.exitCodes).toEqual([]);
  });

  it("reports every screen by default", async () => {
    const cli = createTestCli();

    await cli.program.parseAsync(["report"], { from: "user" });

    expect(cli.output.filter((line) => line.startsWith("=="))).toEqual([
      "== difficulty (800x600)",
      "== management (800x600)",
    ]);
  });

  it("applies surface, gap and expansion flags", async () => {
    const cli = createTestCli();

    await cli.program.parseAsync(
      ["report", "difficulty", "--height", "600", "--min-gap", "16", "--expand", "timeDropdown"],
      { from: "user" },
    );

    expect(cli.output).toContain("timeLabel adjacent to timeDropdown, gap=15px");
    expect(cli.output.at(-1)).toBe("timeDropdown.options covers confirmButton by 50px");
  });

  it("uses the surface size from the environment", async () => {
    const cli = createTestCli({ LAYOUT_SURFACE_WIDTH: "640", LAYOUT_SURFACE_HEIGHT: "480" });

    await cli.program.parseAsync(["report", "management"], { from: "user" });

    expect(cli.output[0]).toBe("== management (640x480)");
  });

  it("parses item counts", async () => {
    const cli = createTestCli();

    await cli.program.parseAsync(
      ["report", "management", "--items", "wordList=50", "--all"],
      { from: "user" },
    );

    expect(cli.output).toContain("wordList clear of deleteWordButton");
  });

  it("sets a failing exit code in strict mode", async () => {
    const cli = createTestCli();

    await cli.program.parseAsync(["report", "management", "--strict"], { from: "user" });

    expect(cli.exitCodes).toEqual([1]);
    expect(cli.entries.at(-1)).toMatchObject({ msg: "Overlapping widgets found" });
  });

  it("rejects malformed flag values", async () => {
    const cli = createTestCli();

    await expect(
      cli.program.parseAsync(["report", "--items", "wordList"], { from: "user" }),
    ).rejects.toBeInstanceOf(CommanderError);
    expect(cli.errors.join("")).toContain('Expected <widgetId>=<count>, got "wordList".');
  });

  it("propagates unknown screens", async () => {
    const cli = createTestCli();

    await expect(
      cli.program.parseAsync(["report", "scores"], { from: "user" }),
    ).rejects.toBeInstanceOf(UnknownScreenError);
  });

  it("prints the paint order with overlays last", async () => {
    const cli = createTestCli();

    await cli.program.parseAsync(["order", "difficulty", "--expand", "timeDropdown"], {
      from: "user",
    });

    expect(cli.output).toEqual([
      "title",
      "difficultyLabel",
      "difficultyButtons",
      "difficultyDescription",
      "timeLabel",
      "timeDropdown",
      "confirmButton",
      "backButton",
      "timeDropdown.options",
    ]);
  });
});
