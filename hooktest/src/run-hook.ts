/**
 * Drives one hook invocation end to end against a FakeToolRunner and a
 * MemoryState, the way the agent would run the charm's executable.
 */

import {
  ENV_AGENT_SOCKET,
  ENV_CHARM_DIR,
  ENV_CONTEXT_ID,
  ENV_MODEL_UUID,
  ENV_RELATION_ID,
  ENV_RELATION_NAME,
  ENV_REMOTE_UNIT,
  ENV_UNIT_NAME,
  relationIdName,
} from "@charmhook/core";
import type { RelationId, UnitId } from "@charmhook/core";
import {
  MemoryState,
  defaultHookConfig,
  main,
  newContextFromEnvironment,
  type CommandTask,
  type Context,
  type Logger,
  type Registry,
} from "@charmhook/hook";
import type { FakeToolRunner } from "./runner.js";

export interface RunHookParams {
  registry: Registry;
  runner: FakeToolRunner;
  /** Hook name, or `cmd-<path>` to run a command */
  hookName: string;
  args?: string[];
  /** Carry state between runs by passing the same MemoryState */
  state?: MemoryState;
  /** Set for relation hooks */
  relationId?: RelationId;
  remoteUnit?: UnitId;
  charmDir?: string;
  log?: Logger;
}

export interface RunHookResult {
  ctxt: Context;
  state: MemoryState;
  task?: CommandTask;
}

/** Environment the agent would set for the given run. */
export function hookEnvironment(params: {
  unit: UnitId;
  charmDir?: string;
  relationId?: RelationId;
  remoteUnit?: UnitId;
}): Record<string, string> {
  const env: Record<string, string> = {
    [ENV_MODEL_UUID]: "00000000-0000-4000-8000-000000000000",
    [ENV_UNIT_NAME]: params.unit,
    [ENV_CHARM_DIR]: params.charmDir ?? "/var/lib/juju/agents/unit-test-0/charm",
    [ENV_CONTEXT_ID]: "test-context-0",
    [ENV_AGENT_SOCKET]: "nats://127.0.0.1:4222",
  };
  if (params.relationId !== undefined) {
    env[ENV_RELATION_NAME] = relationIdName(params.relationId);
    env[ENV_RELATION_ID] = params.relationId;
    if (params.remoteUnit !== undefined) {
      env[ENV_REMOTE_UNIT] = params.remoteUnit;
    }
  }
  return env;
}

/**
 * Runs the named hook. Rejects with whatever the dispatcher rejects with;
 * state saved before a failure is still in `state`.
 */
export async function runHook(params: RunHookParams): Promise<RunHookResult> {
  const state = params.state ?? new MemoryState();
  const { ctxt } = await newContextFromEnvironment({
    registry: params.registry,
    hookName: params.hookName,
    args: params.args ?? [],
    env: hookEnvironment({
      unit: params.runner.unit,
      charmDir: params.charmDir,
      relationId: params.relationId,
      remoteUnit: params.remoteUnit,
    }),
    config: { ...defaultHookConfig },
    runner: params.runner,
    log: params.log,
  });
  try {
    const task = await main(params.registry, ctxt, ctxt.runCommandName === undefined ? state : undefined);
    return { ctxt, state, task };
  } finally {
    await ctxt.close();
  }
}
