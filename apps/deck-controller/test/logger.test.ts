import { describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/logger";

function target() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("createLogger", () => {
  it("drops messages below the level", () => {
    const out = target();
    const logger = createLogger("warn", out);
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    expect(out.debug).not.toHaveBeenCalled();
    expect(out.info).not.toHaveBeenCalled();
    expect(out.warn).toHaveBeenCalledWith("w");
    expect(out.error).toHaveBeenCalledWith("e");
  });

  it("stays quiet when silent", () => {
    const out = target();
    createLogger("silent", out).error("e");
    expect(out.error).not.toHaveBeenCalled();
  });
});
