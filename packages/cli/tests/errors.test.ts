import { describe, it, expect } from "vitest";
import { LinetapError, toErrorPayload } from "../src/errors";
import { ConfigError } from "../src/config/loader";
import { LockError } from "../src/intercept/lock";
import { LogWriteError } from "../src/logs/writer";
import { ProcessRunnerError } from "../src/runner/process";

describe("LinetapError", () => {
  it("toJSON returns { error, message } when no details", () => {
    const err = new LockError("already held");

    expect(err.toJSON()).toEqual({
      error: "LockError",
      message: "already held",
    });
  });

  it("leaves cause unset when none is given", () => {
    expect("cause" in new ConfigError("invalid config")).toBe(false);
  });

  describe("subclasses", () => {
    const cases = [
      ["ConfigError", new ConfigError("invalid config")],
      ["LockError", new LockError("held")],
      ["LogWriteError", new LogWriteError("disk full")],
      ["ProcessRunnerError", new ProcessRunnerError("failed to start", "npm test")],
    ] as const;

    for (const [name, err] of cases) {
      it(`${name} keeps its name and code`, () => {
        expect(err).toBeInstanceOf(LinetapError);
        expect(err.name).toBe(name);
        expect(err.code).toBe(name);
      });
    }

    it("ProcessRunnerError carries the command in its details", () => {
      const err = new ProcessRunnerError("failed to start", "npm test");

      expect(err.toJSON()).toEqual({
        error: "ProcessRunnerError",
        message: "failed to start",
        command: "npm test",
      });
    });

    it("LogWriteError keeps the underlying cause", () => {
      const cause = new Error("EACCES");
      const err = new LogWriteError("cannot write", cause);

      expect(err.cause).toBe(cause);
    });
  });
});

describe("toErrorPayload", () => {
  it("uses the error's own payload for linetap errors", () => {
    expect(toErrorPayload(new ProcessRunnerError("failed to start", "make"))).toEqual({
      error: "ProcessRunnerError",
      message: "failed to start",
      command: "make",
    });
  });

  it("reports anything else as UnknownError", () => {
    expect(toErrorPayload(new Error("boom"))).toEqual({ error: "UnknownError", message: "boom" });
    expect(toErrorPayload(42)).toEqual({ error: "UnknownError", message: "42" });
  });
});
