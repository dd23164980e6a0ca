import { describe, it, expect, vi } from "vitest";
import { createLogger, isLogLevel } from "./logger.js";

describe("createLogger", () => {
  it("prefixes messages with the component tag", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("Pipeline").info("Detected pdf", 42);

    expect(log).toHaveBeenCalledWith("[Pipeline] Detected pdf", 42);
  });

  it("nests child tags", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    createLogger("Pipeline").child("IdRepair").warn("No ID found");

    expect(warn).toHaveBeenCalledWith("[Pipeline:IdRepair] No ID found");
  });

  it("drops messages below the minimum level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = createLogger("Server", "warn");
    logger.debug("hidden");
    logger.error("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[Server] shown");
  });
});

describe("isLogLevel", () => {
  it("accepts only known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
