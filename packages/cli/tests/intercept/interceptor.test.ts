import { describe, it, expect, vi } from "vitest";
import type { OwnerScheduler, UnderlyingStream } from "@linetap/sdk";
import { OwnerLoop } from "../../src/dispatch/owner-loop";
import { StreamInterceptor } from "../../src/intercept/interceptor";
import { StreamState } from "../../src/intercept/stream-state";

type Harness = {
  interceptor: StreamInterceptor;
  state: StreamState;
  events: string[];
  shipped: string[];
  tick: () => void;
  turns: () => number;
};

function makeHarness(underlying?: UnderlyingStream): Harness {
  const events: string[] = [];
  const shipped: string[] = [];
  const turns: Array<() => void> = [];
  const loop = new OwnerLoop((run) => turns.push(run));

  const state = new StreamState(
    "stdout",
    underlying ?? { flush: () => {}, isatty: () => false },
    (text) => {
      events.push(`echo:${JSON.stringify(text)}`);
      return true;
    },
    (line, toStdout) => {
      events.push(`log:${JSON.stringify(line)}:${toStdout}`);
      shipped.push(line);
    },
  );

  return {
    interceptor: new StreamInterceptor(state, loop),
    state,
    events,
    shipped,
    tick: () => {
      const run = turns.shift();
      if (run) run();
    },
    turns: () => turns.length,
  };
}

describe("StreamInterceptor.write", () => {
  it("coalesces unterminated fragments into the line that completes them", () => {
    const h = makeHarness();

    h.interceptor.write("a");
    h.interceptor.write("b");
    h.interceptor.write("c\n");

    expect(h.shipped).toEqual(["abc"]);
  });

  it("ships each newline-terminated write as its own line, in order", () => {
    const h = makeHarness();

    h.interceptor.write("x\n");
    h.interceptor.write("y\n");

    expect(h.shipped).toEqual(["x", "y"]);
  });

  it("ships terminated text synchronously without touching the owner loop", () => {
    const h = makeHarness();

    h.interceptor.write("done\n");

    expect(h.shipped).toEqual(["done"]);
    expect(h.turns()).toBe(0);
  });

  it("echoes every write verbatim before its contribution is logged", () => {
    const h = makeHarness();

    h.interceptor.write("partial ");
    h.interceptor.write("line\n");

    expect(h.events).toEqual([
      'echo:"partial "',
      'echo:"line\\n"',
      'log:"partial line":false',
    ]);
  });

  it("passes an empty write through without ever shipping", () => {
    const h = makeHarness();

    h.interceptor.write("");
    h.tick();

    expect(h.events).toEqual(['echo:""']);
    expect(h.shipped).toEqual([]);
    expect(h.state.pendingCount).toBe(0);
  });

  it("schedules one deferred flush for many unterminated writes", () => {
    const h = makeHarness();

    h.interceptor.write("one ");
    h.interceptor.write("two ");
    h.interceptor.write("three");

    expect(h.turns()).toBe(1);
    expect(h.shipped).toEqual([]);

    h.tick();

    expect(h.shipped).toEqual(["one two three"]);
  });

  it("re-schedules after a deferred flush has run", () => {
    const h = makeHarness();

    h.interceptor.write("first");
    h.tick();
    h.interceptor.write("second");
    h.tick();

    expect(h.shipped).toEqual(["first", "second"]);
  });

  it("strips only a single trailing newline", () => {
    const h = makeHarness();

    h.interceptor.write("spaced\n\n");

    expect(h.shipped).toEqual(["spaced\n"]);
  });

  it("keeps embedded newlines when one write carries several lines", () => {
    const h = makeHarness();

    h.interceptor.write("x\ny\n");

    expect(h.shipped).toEqual(["x\ny"]);
  });

  it("ships a bare newline as an empty line", () => {
    const h = makeHarness();

    h.interceptor.write("\n");

    expect(h.shipped).toEqual([""]);
  });

  it("picks up text written before the deferred flush runs", () => {
    const h = makeHarness();

    h.interceptor.write("progress");
    h.interceptor.write(" 50%");
    h.interceptor.write(" 100%\n");
    h.tick();

    expect(h.shipped).toEqual(["progress 50% 100%"]);
  });

  it("hands the write callback to the passthrough and returns its result", () => {
    const passthrough = vi.fn(() => false);
    const state = new StreamState(
      "stderr",
      { flush: () => {}, isatty: () => false },
      passthrough,
      () => {},
    );
    const interceptor = new StreamInterceptor(state, { schedule: () => {} });
    const done = () => {};

    expect(interceptor.write("oops\n", done)).toBe(false);
    expect(passthrough).toHaveBeenCalledWith("oops\n", done);
  });

  it("asks the scheduler for a quiet, cross-context flush", () => {
    const schedule = vi.fn<OwnerScheduler["schedule"]>();
    const state = new StreamState(
      "stdout",
      { flush: () => {}, isatty: () => false },
      () => true,
      () => {},
    );
    const interceptor = new StreamInterceptor(state, { schedule });

    interceptor.write("a");
    interceptor.write("b");

    expect(schedule).toHaveBeenCalledTimes(1);
    expect(schedule.mock.calls[0][1]).toEqual({ fromOtherContext: true, quiet: true });
  });

  it("lets a log sink failure surface after the echo happened", () => {
    const echoed: string[] = [];
    const state = new StreamState(
      "stdout",
      { flush: () => {}, isatty: () => false },
      (text) => {
        echoed.push(text);
        return true;
      },
      () => {
        throw new Error("backend unavailable");
      },
    );
    const interceptor = new StreamInterceptor(state, { schedule: () => {} });

    expect(() => interceptor.write("lost?\n")).toThrow("backend unavailable");
    expect(echoed).toEqual(["lost?\n"]);
    expect(state.pendingCount).toBe(0);
  });
});

describe("StreamInterceptor.shipLog", () => {
  it("is a no-op with nothing pending", () => {
    const h = makeHarness();

    h.interceptor.shipLog();
    h.interceptor.shipLog();

    expect(h.events).toEqual([]);
  });

  it("does nothing when a scheduled flush finds the buffer already shipped", () => {
    const h = makeHarness();

    h.interceptor.write("early");
    h.interceptor.shipLog();
    h.tick();

    expect(h.shipped).toEqual(["early"]);
  });

  it("clears the scheduled flag before shipping", () => {
    const h = makeHarness();

    h.interceptor.write("pending");
    expect(h.state.scheduled).toBe(true);

    h.tick();

    expect(h.state.scheduled).toBe(false);
  });
});

describe("StreamInterceptor delegation", () => {
  it("delegates flush and isatty to the underlying stream", () => {
    const underlying = { flush: vi.fn(), isatty: vi.fn(() => true) };
    const h = makeHarness(underlying);

    h.interceptor.write("buffered");
    h.interceptor.flush();

    expect(underlying.flush).toHaveBeenCalledTimes(1);
    expect(h.interceptor.isatty()).toBe(true);
    expect(h.state.pendingCount).toBe(1);
  });
});

describe("concurrent writers", () => {
  it("ships every terminated token exactly once", async () => {
    const shipped: string[] = [];
    const state = new StreamState(
      "stdout",
      { flush: () => {}, isatty: () => false },
      () => true,
      (line) => shipped.push(line),
    );
    const loop = new OwnerLoop();
    const interceptor = new StreamInterceptor(state, loop);

    const writers = Array.from({ length: 25 }, (_, i) =>
      new Promise<void>((resolve) => {
        setTimeout(() => {
          interceptor.write(`token-${i}\n`);
          resolve();
        }, i % 5);
      }),
    );
    await Promise.all(writers);
    await loop.whenIdle();

    expect(shipped).toHaveLength(25);
    expect([...shipped].sort()).toEqual(
      Array.from({ length: 25 }, (_, i) => `token-${i}`).sort(),
    );
  });

  it("loses no fragment when partial writes race the owner loop", async () => {
    const shipped: string[] = [];
    const state = new StreamState(
      "stdout",
      { flush: () => {}, isatty: () => false },
      () => true,
      (line) => shipped.push(line),
    );
    const loop = new OwnerLoop();
    const interceptor = new StreamInterceptor(state, loop);

    const writers = Array.from({ length: 10 }, (_, i) =>
      new Promise<void>((resolve) => {
        setImmediate(() => {
          interceptor.write(`<${i}>`);
          resolve();
        });
      }),
    );
    await Promise.all(writers);
    await loop.whenIdle();

    const joined = shipped.join("");
    for (let i = 0; i < 10; i++) {
      expect(joined.split(`<${i}>`)).toHaveLength(2);
    }
    expect(joined).toHaveLength(Array.from({ length: 10 }, (_, i) => `<${i}>`).join("").length);
  });
});

describe("StreamInterceptor.record", () => {
  it("buffers and ships like write without echoing", () => {
    const h = makeHarness();

    h.interceptor.record("part");
    expect(h.turns()).toBe(1);
    h.interceptor.record("ial\n");

    expect(h.events).toEqual(['log:"partial":false']);
  });
});
