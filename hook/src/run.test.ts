/**
 * Unit tests for runMain: argument handling, exit codes and error
 * reporting at the process boundary.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { CommandTask } from "./command.js";
import { Registry, type StateRef } from "./registry.js";
import { runMain } from "./run.js";
import type { ToolRunner } from "./runner.js";

function createMockRunner(): ToolRunner {
  return {
    run: vi.fn().mockResolvedValue(Buffer.alloc(0)),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

describe("runMain", () => {
  let dir: string;
  let env: Record<string, string>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "charmhook-run-"));
    env = {
      JUJU_MODEL_UUID: "uuid-1",
      JUJU_UNIT_NAME: "app/0",
      CHARM_DIR: join(dir, "charm"),
      JUJU_CONTEXT_ID: "ctx-1",
      JUJU_AGENT_SOCKET: "nats://127.0.0.1:4222",
      HOOK_STATE_DIR: join(dir, "state"),
    };
  });

  afterEach(async () => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("should run the hook, save state and exit 0", async () => {
    const r = new Registry();
    const ref: StateRef<{ installed: boolean }> = { value: { installed: false } };
    const m = r.newSubRegistry("m");
    m.registerState(ref);
    m.register("install", () => {
      ref.value.installed = true;
    });
    r.registerMainHooks();
    const runner = createMockRunner();

    const code = await runMain(r, { argv: ["node", "runhook", "install"], env, log: {}, runner });

    expect(code).toBe(0);
    expect(process.exitCode).toBe(0);
    expect(await readFile(join(dir, "state", "m.json"), "utf-8")).toBe('{"installed":true}');
    expect(runner.close).toHaveBeenCalledTimes(1);
  });

  it("should print usage and exit 2 for an unknown hook", async () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const r = new Registry();
    r.registerMainHooks();

    const code = await runMain(r, { argv: ["node", "runhook", "bogus"], env, log: {}, runner: createMockRunner() });

    expect(code).toBe(2);
    expect(process.exitCode).toBe(2);
    expect(stderr).toHaveBeenCalledWith("usage: runhook install\n\t| runhook start");
  });

  it("should log a handler failure and exit 1", async () => {
    const r = new Registry();
    r.register("config-changed", () => {
      throw new Error("bad config");
    });
    const log = { error: vi.fn() };

    const code = await runMain(r, { argv: ["node", "runhook", "config-changed"], env, log, runner: createMockRunner() });

    expect(code).toBe(1);
    expect(log.error).toHaveBeenCalledWith(
      {
        code: "HANDLER_FAILED",
        error: 'charmhook:main:runHooks - Hook "config-changed" handler 0 (root) failed: bad config',
        saveError: undefined,
      },
      "runhook:main - Fatal"
    );
  });

  it("should keep the handler failure when closing the context fails", async () => {
    const r = new Registry();
    r.register("config-changed", () => {
      throw new Error("bad config");
    });
    const runner: ToolRunner = {
      run: vi.fn().mockResolvedValue(Buffer.alloc(0)),
      close: vi.fn().mockRejectedValue(new Error("connection lost")),
    };
    const log = { error: vi.fn(), warn: vi.fn() };

    const code = await runMain(r, { argv: ["node", "runhook", "config-changed"], env, log, runner });

    expect(code).toBe(1);
    expect(log.error).toHaveBeenCalledWith(expect.objectContaining({ code: "HANDLER_FAILED" }), "runhook:main - Fatal");
    expect(log.warn).toHaveBeenCalledWith({ error: "connection lost" }, "runhook:main - Cannot close context");
  });

  it("should exit 1 when the environment is incomplete", async () => {
    const log = { error: vi.fn() };
    const partial = { ...env };
    delete partial["JUJU_CONTEXT_ID"];

    const code = await runMain(new Registry(), {
      argv: ["node", "runhook", "install"],
      env: partial,
      log,
      runner: createMockRunner(),
    });

    expect(code).toBe(1);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ code: "PRECONDITION_FAILED" }),
      "runhook:main - Fatal"
    );
  });

  it("should exit 1 on invalid settings", async () => {
    const log = { error: vi.fn() };
    const code = await runMain(new Registry(), {
      argv: ["node", "runhook", "install"],
      env: { ...env, HOOK_TOOL_RUNNER: "carrier-pigeon" },
      log,
    });

    expect(code).toBe(1);
    expect(log.error).toHaveBeenCalledWith(expect.objectContaining({ code: "INVALID_CONFIG" }), "runhook:main - Fatal");
  });

  it("should wait for a command's task before exiting", async () => {
    const r = new Registry();
    const steps: string[] = [];
    r.registerCommand("migrate", (args) =>
      CommandTask.start(async () => {
        await Promise.resolve();
        steps.push(`migrated ${args.join(",")}`);
      })
    );

    const code = await runMain(r, {
      argv: ["node", "runhook", "cmd-migrate", "--to", "v2"],
      env: {},
      log: {},
      runner: createMockRunner(),
    });

    expect(code).toBe(0);
    expect(steps).toEqual(["migrated --to,v2"]);
  });
});
