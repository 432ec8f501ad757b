/**
 * Socket tool runner: sends hook tool requests to the agent over an already
 * established NATS connection instead of spawning a process per tool.
 *
 * The agent answers on the request subject with a ToolResponse carrying the
 * tool's exit code and output, so results and errors look exactly as they do
 * for the exec runner.
 */

import { connect } from "nats";
import { HookError, ToolResponseSchema } from "@charmhook/core";
import type { ToolRequest } from "@charmhook/core";
import { classifyToolError, type ToolRunner } from "./runner.js";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "charmhook:socket-runner";

/**
 * The part of a NATS connection the runner needs. A NatsConnection
 * satisfies it; tests pass a mock.
 */
export interface ToolRpcConnection {
  request(subject: string, payload: Uint8Array, opts: { timeout: number }): Promise<{ data: Uint8Array }>;
  close(): Promise<void>;
}

export interface SocketToolRunnerConfig {
  /** Subject tool requests are sent to */
  subject: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

export class SocketToolRunner implements ToolRunner {
  private connection: ToolRpcConnection;
  private contextId: string;
  private dir: string;
  private config: SocketToolRunnerConfig;
  private log: Logger;

  constructor(params: {
    connection: ToolRpcConnection;
    contextId: string;
    dir: string;
    config: SocketToolRunnerConfig;
    log?: Logger;
  }) {
    this.connection = params.connection;
    this.contextId = params.contextId;
    this.dir = params.dir;
    this.config = params.config;
    this.log = params.log ?? {};
  }

  async run(cmd: string, ...args: string[]): Promise<Buffer> {
    const request: ToolRequest = {
      contextId: this.contextId,
      dir: this.dir,
      commandName: cmd,
      args,
    };
    const payload = new TextEncoder().encode(JSON.stringify(request));

    this.log.debug?.({ cmd, args }, `${LOG_PREFIX}:run - Sending tool request`);
    const reply = await this.connection.request(this.config.subject, payload, {
      timeout: this.config.timeoutMs,
    });

    let raw: unknown;
    try {
      raw = JSON.parse(new TextDecoder().decode(reply.data));
    } catch (err) {
      throw new HookError({
        code: "TOOL_FAILED",
        message: `${LOG_PREFIX}:run - Invalid JSON reply for ${cmd}`,
        details: { tool: cmd },
        cause: err,
      });
    }
    const parsed = ToolResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new HookError({
        code: "TOOL_FAILED",
        message: `${LOG_PREFIX}:run - Malformed reply for ${cmd}`,
        details: { tool: cmd, issues: parsed.error.flatten() },
      });
    }

    const response = parsed.data;
    if (!response.ok) {
      throw classifyToolError(cmd, response.error.message);
    }
    const { result } = response;
    if (result.code !== 0) {
      const stderr = Buffer.from(result.stderr, "base64").toString("utf-8");
      if (stderr.trim().length > 0) {
        throw classifyToolError(cmd, stderr);
      }
      throw new HookError({
        code: "TOOL_FAILED",
        message: `${LOG_PREFIX}:run - ${cmd} exited with status ${result.code}`,
        details: { tool: cmd },
      });
    }
    return Buffer.from(result.stdout, "base64");
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}

/**
 * Connects to the agent's RPC endpoint and returns a runner bound to the
 * given hook context.
 */
export async function connectSocketToolRunner(params: {
  address: string;
  contextId: string;
  dir: string;
  config: SocketToolRunnerConfig;
  log?: Logger;
}): Promise<SocketToolRunner> {
  const { address, log = {} } = params;
  log.debug?.({ address }, `${LOG_PREFIX}:connectSocketToolRunner - Connecting`);
  let connection: ToolRpcConnection;
  try {
    connection = await connect({ servers: address, name: `hook-${params.contextId}` });
  } catch (err) {
    throw new HookError({
      code: "TOOL_FAILED",
      message: `${LOG_PREFIX}:connectSocketToolRunner - Cannot dial agent at ${address}`,
      details: { address },
      cause: err,
    });
  }
  return new SocketToolRunner({ ...params, connection });
}
