/**
 * Framework configuration: which tool runner to use, where state lives and
 * how loudly to log.
 */

import { join } from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ENV_CHARM_DIR, HookError } from "@charmhook/core";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "charmhook:config";

/** File in the charm directory that may supply defaults for the settings below. */
export const HOOK_ENV_FILE = "hook.env";

/**
 * How hook tools are invoked: "exec" spawns the tool as a subprocess,
 * "socket" sends the request to the agent over an RPC connection.
 */
export type ToolRunnerKind = "exec" | "socket";

export interface HookConfig {
  runner: ToolRunnerKind;
  /**
   * Multi-call executable to spawn for every tool (with argv[0] set to the
   * tool name) instead of looking each tool up by name.
   */
  toolExecutable?: string;
  /** Subject the socket runner sends tool requests to */
  toolSubject: string;
  /** Request timeout for the socket runner */
  toolTimeoutMs: number;
  /** Root directory for persistent state; undefined when CHARM_DIR is unknown */
  stateDir?: string;
  logLevel: "debug" | "info" | "warn" | "error";
}

export const defaultHookConfig = {
  runner: "exec",
  toolSubject: "juju.hook-tool",
  toolTimeoutMs: 300_000,
  logLevel: "info",
} as const;

const HookSettingsSchema = z.object({
  HOOK_TOOL_RUNNER: z.enum(["exec", "socket"]).default(defaultHookConfig.runner),
  HOOK_TOOL_EXECUTABLE: z.string().min(1).optional(),
  HOOK_TOOL_SUBJECT: z.string().min(1).default(defaultHookConfig.toolSubject),
  HOOK_TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(defaultHookConfig.toolTimeoutMs),
  HOOK_STATE_DIR: z.string().min(1).optional(),
  HOOK_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default(defaultHookConfig.logLevel),
});

/**
 * Load config from the environment, falling back to $CHARM_DIR/hook.env for
 * anything the environment leaves unset. Empty values count as unset.
 */
export function loadConfig(params: {
  env?: Record<string, string | undefined>;
  log?: Logger;
}): HookConfig {
  const log = params.log ?? {};
  const source = params.env ?? process.env;
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value) env[key] = value;
  }

  const charmDir = env[ENV_CHARM_DIR];
  if (charmDir) {
    const path = join(charmDir, HOOK_ENV_FILE);
    const { parsed } = loadDotenv({ path, processEnv: env, override: false });
    if (parsed) {
      log.debug?.({ path, keys: Object.keys(parsed) }, `${LOG_PREFIX}:loadConfig - Loaded settings file`);
    }
  }

  const settings = HookSettingsSchema.safeParse(env);
  if (!settings.success) {
    throw new HookError({
      code: "INVALID_CONFIG",
      message: `${LOG_PREFIX}:loadConfig - Invalid hook settings: ${settings.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      details: { issues: settings.error.flatten().fieldErrors },
    });
  }

  const s = settings.data;
  return {
    runner: s.HOOK_TOOL_RUNNER,
    toolExecutable: s.HOOK_TOOL_EXECUTABLE,
    toolSubject: s.HOOK_TOOL_SUBJECT,
    toolTimeoutMs: s.HOOK_TOOL_TIMEOUT_MS,
    stateDir: s.HOOK_STATE_DIR ?? (charmDir ? join(charmDir, "..", "state") : undefined),
    logLevel: s.HOOK_LOG_LEVEL,
  };
}
