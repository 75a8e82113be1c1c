import { describe, test, expect, vi, afterEach } from "vitest";
import { logInfo, logWarn, setLogSink } from "../../src/core/log";

describe("log", () => {
    afterEach(() => {
        setLogSink(null);
        vi.restoreAllMocks();
    });

    test("falls back to the console, prefixing warnings", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        logInfo("loaded");
        logWarn("short preset");
        expect(log).toHaveBeenCalledWith("loaded");
        expect(warn).toHaveBeenCalledWith("Warning: short preset");
    });

    test("a sink that handles the message keeps it off the console", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const seen: string[] = [];
        setLogSink((level, msg) => {
            seen.push(level + ":" + msg);
            return level === "warn";
        });
        logWarn("x");
        expect(seen).toEqual(["warn:Warning: x"]);
        expect(warn).not.toHaveBeenCalled();
    });
});
