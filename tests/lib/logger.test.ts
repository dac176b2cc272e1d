import { describe, it, expect, vi, afterEach } from "vitest";

import { Logger } from "@/lib/logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs info messages by default", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = new Logger();
    log.info("hello");
    expect(info).toHaveBeenCalledWith("hello");
  });

  it("takes its level and prefix from the constructor", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = new Logger({ level: "debug", prefix: "[bench]" });
    expect(log.getLevel()).toBe("debug");
    log.info("ready");
    expect(info).toHaveBeenCalledWith("[bench] ready");
  });

  it("suppresses debug messages at info level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const log = new Logger();
    log.debug("hidden");
    expect(debug).not.toHaveBeenCalled();
  });

  it("emits debug messages once configured", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ level: "debug" });
    log.debug("shown");
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith(expect.stringContaining("shown"));
  });

  it("writes errors to console.error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    new Logger().error("broken");
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(expect.stringContaining("broken"));
  });

  it("silent level suppresses errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    new Logger({ level: "silent" }).error("nope");
    expect(error).not.toHaveBeenCalled();
  });

  it("shows success messages at info level only", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    new Logger({ level: "error" }).success("hidden");
    expect(info).not.toHaveBeenCalled();

    new Logger().success("matched");
    expect(info).toHaveBeenCalledWith(expect.stringContaining("matched"));
  });

  it("child loggers inherit the level and chain prefixes", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = new Logger({ level: "error", prefix: "[root]" });
    const child = log.child("[batch]");
    expect(child.getLevel()).toBe("error");

    child.info("skipped");
    expect(info).not.toHaveBeenCalled();

    child.configure({ level: "info" });
    child.info("done");
    expect(info).toHaveBeenCalledWith("[root] [batch] done");
  });
});
