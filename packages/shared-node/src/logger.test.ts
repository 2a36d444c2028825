import { describe, expect, it } from "vitest";
import { createCaptureLogger } from "./test-utils";

describe("createLogger", () => {
  it("writes structured entries to a custom destination", () => {
    const { logger, entries } = createCaptureLogger();

    logger.info({ screenId: "difficulty" }, "Layout computed");
    logger.debug("details");

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      level: 30,
      msg: "Layout computed",
      screenId: "difficulty",
    });
    expect(entries[1]).toMatchObject({ level: 20, msg: "details" });
  });

  it("drops entries below the configured level", () => {
    const { logger, entries } = createCaptureLogger("warn");

    logger.info("ignored");
    logger.warn("kept");

    expect(entries.map((entry) => entry.msg)).toEqual(["kept"]);
  });
});
