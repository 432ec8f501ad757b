/**
 * Hook tool runners. Hook tools (relation-get, config-get, ...) are the
 * agent's side channel: everything a hook learns beyond its environment
 * variables comes from running one of them.
 */

import { spawn } from "node:child_process";
import { HookError } from "@charmhook/core";

const LOG_PREFIX = "charmhook:runner";

/** Prefix the agent uses when it does not know a requested tool. */
const UNKNOWN_COMMAND_PREFIX = "bad request: unknown command";

/**
 * ToolRunner is used to run hook tools.
 */
export interface ToolRunner {
  /**
   * Runs the named hook tool with the given arguments and resolves to its
   * standard output. Rejects with an UNIMPLEMENTED HookError when the agent
   * does not support the tool.
   */
  run(cmd: string, ...args: string[]): Promise<Buffer>;
  /** Releases any connection held by the runner. */
  close(): Promise<void>;
}

/**
 * Turns the standard error of a failed tool into a HookError: trimmed, a
 * leading "error: " removed, and classified as UNIMPLEMENTED when the agent
 * reports an unknown command, TOOL_FAILED otherwise.
 */
export function classifyToolError(cmd: string, stderr: string): HookError {
  let text = stderr.trim();
  if (text.startsWith("error: ")) {
    text = text.slice("error: ".length);
  }
  if (text.startsWith(UNKNOWN_COMMAND_PREFIX)) {
    return new HookError({
      code: "UNIMPLEMENTED",
      message: text,
      details: { tool: cmd },
    });
  }
  return new HookError({
    code: "TOOL_FAILED",
    message: text,
    details: { tool: cmd },
  });
}

export interface ExecToolRunnerOptions {
  /**
   * When set, this executable is spawned for every tool with argv[0] set to
   * the tool name, for agents that ship one multi-call binary instead of a
   * symlink per tool.
   */
  executable?: string;
  /** Working directory for the tool processes */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs hook tools as subprocesses, the conventional way.
 */
export class ExecToolRunner implements ToolRunner {
  private options: ExecToolRunnerOptions;

  constructor(options: ExecToolRunnerOptions = {}) {
    this.options = options;
  }

  run(cmd: string, ...args: string[]): Promise<Buffer> {
    const file = this.options.executable ?? cmd;
    return new Promise((resolve, reject) => {
      const child = spawn(file, args, {
        argv0: cmd,
        cwd: this.options.cwd,
        env: this.options.env,
        stdio: ["ignore", "pipe", "pipe"],
      });
      const out: Buffer[] = [];
      const errOut: Buffer[] = [];
      let settled = false;
      child.stdout.on("data", (chunk: Buffer) => out.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => errOut.push(chunk));
      child.on("error", (err) => {
        if (settled) return;
        settled = true;
        reject(err);
      });
      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        if (code === 0) {
          resolve(Buffer.concat(out));
          return;
        }
        const errText = Buffer.concat(errOut).toString("utf-8");
        if (errText.trim().length > 0) {
          reject(classifyToolError(cmd, errText));
          return;
        }
        reject(
          new Error(
            signal
              ? `${LOG_PREFIX}:run - ${cmd} killed by ${signal}`
              : `${LOG_PREFIX}:run - ${cmd} exited with status ${code}`
          )
        );
      });
    });
  }

  async close(): Promise<void> {
    // Nothing held between calls.
  }
}

/**
 * Runs a tool and parses its `--format json` output.
 */
export async function runJson(runner: ToolRunner, cmd: string, ...args: string[]): Promise<unknown> {
  const out = await runner.run(cmd, "--format", "json", ...args);
  const text = out.toString("utf-8").trim();
  if (text === "") return null;
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new HookError({
      code: "TOOL_FAILED",
      message: `${LOG_PREFIX}:runJson - Cannot parse output of ${cmd}: ${text.slice(0, 200)}`,
      details: { tool: cmd, args },
      cause: err,
    });
  }
}
