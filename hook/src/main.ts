/**
 * Hook dispatch: runs the command or the hook functions selected by the
 * context, with persistent state loaded before and saved after.
 */

import { COMMAND_PREFIX, HookError, WILDCARD_EVENT, errorMessage } from "@charmhook/core";
import { CommandTask } from "./command.js";
import type { Context } from "./context.js";
import type { Logger } from "./logger.js";
import type { HookEntry, Registry } from "./registry.js";
import type { PersistentState } from "./state.js";

const LOG_PREFIX = "charmhook:main";

/**
 * Invokes the command or hook functions from the given registry (or a
 * registry derived from it) that the context selects.
 *
 * A command that starts long-lived work returns a CommandTask, and main
 * returns it rather than waiting for it to complete.
 *
 * For a hook, all registered state is loaded from state before anything
 * runs and saved back afterwards, even when a hook function fails, so that
 * the work of the functions that did succeed is kept.
 */
export async function main(
  r: Registry,
  ctxt: Context,
  state: PersistentState | undefined,
  log: Logger = ctxt.log
): Promise<CommandTask | undefined> {
  if (ctxt.runCommandName !== undefined) {
    log.info?.(
      { command: ctxt.runCommandName, args: ctxt.runCommandArgs },
      `${LOG_PREFIX}:main - Running command`
    );
    const cmd = r.command(ctxt.runCommandName);
    if (!cmd) {
      throw usageError(r);
    }
    const task = await cmd([...ctxt.runCommandArgs]);
    return task instanceof CommandTask ? task : undefined;
  }
  if (!state) {
    throw new HookError({
      code: "PRECONDITION_FAILED",
      message: `${LOG_PREFIX}:main - No persistent state for hook "${ctxt.hookName}"`,
    });
  }

  log.info?.({ hook: ctxt.hookName }, `${LOG_PREFIX}:main - Running hook`);
  await loadState(r, state);

  for (const setter of r.contextSetters()) {
    try {
      await setter(ctxt);
    } catch (err) {
      throw new HookError({
        code: "CONTEXT_SETTER_FAILED",
        message: `${LOG_PREFIX}:main - Cannot set context: ${errorMessage(err)}`,
        cause: err,
      });
    }
  }

  let failure: unknown;
  try {
    await runHooks(r, ctxt, log);
  } catch (err) {
    failure = err;
  }

  // All the hooks have now run; save the state.
  try {
    await saveState(r, state);
  } catch (saveErr) {
    if (failure === undefined) {
      throw saveErr;
    }
    log.error?.(
      { hook: ctxt.hookName, error: errorMessage(saveErr) },
      `${LOG_PREFIX}:main - Cannot save local state`
    );
    if (failure instanceof HookError) {
      failure.saveError = saveErr;
    }
  }
  if (failure !== undefined) {
    throw failure;
  }
  log.info?.({ hook: ctxt.hookName }, `${LOG_PREFIX}:main - Hook completed`);
  return undefined;
}

async function runHooks(r: Registry, ctxt: Context, log: Logger): Promise<void> {
  const named = r.hookEntries(ctxt.hookName);
  if (named.length === 0) {
    log.warn?.({ hook: ctxt.hookName }, `${LOG_PREFIX}:runHooks - Hook not registered`);
    throw usageError(r);
  }
  // The wildcard hooks always run after any other registered hooks.
  const entries: HookEntry[] = [...named, ...r.hookEntries(WILDCARD_EVENT)];
  for (const [index, entry] of entries.entries()) {
    log.debug?.(
      { hook: ctxt.hookName, namespace: entry.namespace, index },
      `${LOG_PREFIX}:runHooks - Running handler`
    );
    try {
      await entry.run(ctxt);
    } catch (err) {
      throw new HookError({
        code: "HANDLER_FAILED",
        message: `${LOG_PREFIX}:runHooks - Hook "${ctxt.hookName}" handler ${index} (${
          entry.namespace || "root"
        }) failed: ${errorMessage(err)}`,
        details: { hook: ctxt.hookName, namespace: entry.namespace, index },
        cause: err,
      });
    }
  }
}

/**
 * Loads every registered state value. A name with nothing saved, or saved
 * as null, keeps its default value. Without a schema, a saved object is
 * merged over an object default so fields added since the save keep their
 * defaults.
 */
export async function loadState(r: Registry, state: PersistentState): Promise<void> {
  for (const entry of r.stateEntries()) {
    const name = entry.namespace;
    let data: Buffer | null;
    try {
      data = await state.load(name);
    } catch (err) {
      throw stateError("STATE_LOAD_FAILED", `Cannot load state for ${displayName(name)}`, name, err);
    }
    if (data === null) continue;
    let value: unknown;
    try {
      value = JSON.parse(data.toString("utf-8"));
    } catch (err) {
      throw stateError("STATE_LOAD_FAILED", `Cannot unmarshal state for ${displayName(name)}`, name, err);
    }
    if (value === null) continue;
    if (entry.schema) {
      const parsed = entry.schema.safeParse(value);
      if (!parsed.success) {
        throw stateError("STATE_LOAD_FAILED", `Invalid state for ${displayName(name)}`, name, parsed.error);
      }
      entry.ref.value = parsed.data;
    } else if (isPlainObject(entry.ref.value) && isPlainObject(value)) {
      entry.ref.value = { ...entry.ref.value, ...value };
    } else {
      entry.ref.value = value;
    }
  }
}

/**
 * Saves every registered state value, stopping at the first failure.
 */
export async function saveState(r: Registry, state: PersistentState): Promise<void> {
  for (const entry of r.stateEntries()) {
    const name = entry.namespace;
    let data: Buffer;
    try {
      data = Buffer.from(JSON.stringify(entry.ref.value) ?? "null", "utf-8");
    } catch (err) {
      throw stateError("STATE_SAVE_FAILED", `Cannot marshal state for ${displayName(name)}`, name, err);
    }
    try {
      await state.save(name, data);
    } catch (err) {
      throw stateError("STATE_SAVE_FAILED", `Cannot save state for ${displayName(name)}`, name, err);
    }
  }
}

/**
 * Error listing every valid invocation: commands first, then hooks, each
 * group sorted.
 */
export function usageError(r: Registry): HookError {
  const allowed = [
    ...r.registeredCommands().map((cmd) => `${COMMAND_PREFIX}${cmd} [arg...]`),
    ...r.registeredHooks(),
  ];
  return new HookError({
    code: "USAGE",
    message: `usage: runhook ${allowed.join("\n\t| runhook ")}`,
    details: { allowed },
  });
}

function stateError(
  code: "STATE_LOAD_FAILED" | "STATE_SAVE_FAILED",
  what: string,
  namespace: string,
  cause: unknown
): HookError {
  return new HookError({
    code,
    message: `${LOG_PREFIX}:${code === "STATE_LOAD_FAILED" ? "loadState" : "saveState"} - ${what}: ${errorMessage(cause)}`,
    details: { namespace },
    cause,
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function displayName(namespace: string): string {
  return namespace === "" ? "root" : `"${namespace}"`;
}
