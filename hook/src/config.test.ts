/**
 * Unit tests for loadConfig: environment, hook.env fallback and validation.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { HookError } from "@charmhook/core";
import { HOOK_ENV_FILE, loadConfig } from "./config.js";

describe("loadConfig", () => {
  let charmDir: string;

  beforeEach(async () => {
    charmDir = await mkdtemp(join(tmpdir(), "charmhook-config-"));
  });

  afterEach(async () => {
    await rm(charmDir, { recursive: true, force: true });
  });

  it("should use the defaults for an empty environment", () => {
    expect(loadConfig({ env: {} })).toEqual({
      runner: "exec",
      toolExecutable: undefined,
      toolSubject: "juju.hook-tool",
      toolTimeoutMs: 300_000,
      stateDir: undefined,
      logLevel: "info",
    });
  });

  it("should put the state dir beside the charm dir by default", () => {
    const config = loadConfig({ env: { CHARM_DIR: "/var/lib/agent/charm" } });
    expect(config.stateDir).toBe("/var/lib/agent/state");
  });

  it("should read settings from the environment", () => {
    const config = loadConfig({
      env: {
        HOOK_TOOL_RUNNER: "socket",
        HOOK_TOOL_EXECUTABLE: "/usr/bin/hook-tools",
        HOOK_TOOL_SUBJECT: "agent.tools",
        HOOK_TOOL_TIMEOUT_MS: "2500",
        HOOK_STATE_DIR: "/srv/state",
        HOOK_LOG_LEVEL: "debug",
      },
    });
    expect(config).toEqual({
      runner: "socket",
      toolExecutable: "/usr/bin/hook-tools",
      toolSubject: "agent.tools",
      toolTimeoutMs: 2500,
      stateDir: "/srv/state",
      logLevel: "debug",
    });
  });

  it("should treat empty values as unset", () => {
    const config = loadConfig({ env: { HOOK_TOOL_RUNNER: "", HOOK_LOG_LEVEL: "" } });
    expect(config.runner).toBe("exec");
    expect(config.logLevel).toBe("info");
  });

  it("should fall back to hook.env in the charm dir", async () => {
    await writeFile(join(charmDir, HOOK_ENV_FILE), "HOOK_TOOL_RUNNER=socket\nHOOK_LOG_LEVEL=debug\n");
    const log = { debug: vi.fn() };

    const config = loadConfig({ env: { CHARM_DIR: charmDir, HOOK_LOG_LEVEL: "warn" }, log });

    expect(config.runner).toBe("socket");
    expect(config.logLevel).toBe("warn");
    expect(log.debug).toHaveBeenCalledWith(
      { path: join(charmDir, HOOK_ENV_FILE), keys: ["HOOK_TOOL_RUNNER", "HOOK_LOG_LEVEL"] },
      "charmhook:config:loadConfig - Loaded settings file"
    );
  });

  it("should not modify the environment it was given", async () => {
    await writeFile(join(charmDir, HOOK_ENV_FILE), "HOOK_TOOL_SUBJECT=agent.tools\n");
    const env: Record<string, string | undefined> = { CHARM_DIR: charmDir };

    expect(loadConfig({ env }).toolSubject).toBe("agent.tools");
    expect(env).toEqual({ CHARM_DIR: charmDir });
  });

  it("should fail with INVALID_CONFIG on a bad value", () => {
    const err = ((): unknown => {
      try {
        return loadConfig({ env: { HOOK_TOOL_RUNNER: "pipe", HOOK_TOOL_TIMEOUT_MS: "-1" } });
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(HookError);
    expect(err).toMatchObject({ code: "INVALID_CONFIG" });
    expect(err instanceof Error ? err.message : "").toMatch(/^charmhook:config:loadConfig - Invalid hook settings: /);
    expect(err instanceof Error ? err.message : "").toContain("HOOK_TOOL_RUNNER");
    expect(err instanceof Error ? err.message : "").toContain("HOOK_TOOL_TIMEOUT_MS");
  });
});
