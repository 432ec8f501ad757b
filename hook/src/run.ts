/**
 * Process entry for a charm's hook executable. A charm's launcher builds its
 * registry and hands it to runMain:
 *
 *   const r = new Registry();
 *   registerHooks(r);
 *   r.registerMainHooks();
 *   await runMain(r);
 */

import { HookError, errorMessage, isHookError } from "@charmhook/core";
import { waitWithSignals } from "./command.js";
import { loadConfig } from "./config.js";
import { newContextFromEnvironment } from "./context.js";
import { createNodeJSLogger, type Logger } from "./logger.js";
import { main } from "./main.js";
import type { Registry } from "./registry.js";
import type { ToolRunner } from "./runner.js";

const SERVICE_NAME = "runhook";

export interface RunMainOptions {
  /** Defaults to process.argv */
  argv?: string[];
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  log?: Logger;
  runner?: ToolRunner;
}

/**
 * Runs one hook or command invocation and resolves to the process exit
 * code, which is also stored in process.exitCode.
 */
export async function runMain(r: Registry, options: RunMainOptions = {}): Promise<number> {
  const argv = options.argv ?? process.argv;
  const env = options.env ?? process.env;
  const bootLog = options.log ?? createNodeJSLogger(SERVICE_NAME).get(`${SERVICE_NAME}:main`);

  let log = bootLog;
  let code = 0;
  try {
    const config = loadConfig({ env, log: bootLog });
    log = options.log ?? createNodeJSLogger(SERVICE_NAME, { level: config.logLevel }).get(`${SERVICE_NAME}:main`);
    const [hookName = "", ...args] = argv.slice(2);
    const { ctxt, state } = await newContextFromEnvironment({
      registry: r,
      hookName,
      args,
      env,
      config,
      runner: options.runner,
      log,
    });
    try {
      const task = await main(r, ctxt, state, log);
      if (task) {
        await waitWithSignals(task, log);
      }
    } finally {
      try {
        await ctxt.close();
      } catch (closeErr) {
        log.warn?.({ error: errorMessage(closeErr) }, `${SERVICE_NAME}:main - Cannot close context`);
      }
    }
  } catch (err) {
    const usage = isHookError(err, "USAGE");
    code = usage ? 2 : 1;
    if (usage) {
      console.error(errorMessage(err));
    } else {
      log.error?.(
        {
          code: err instanceof HookError ? err.code : undefined,
          error: errorMessage(err),
          saveError: err instanceof HookError && err.saveError !== undefined ? errorMessage(err.saveError) : undefined,
        },
        `${SERVICE_NAME}:main - Fatal`
      );
    }
  }
  process.exitCode = code;
  return code;
}
