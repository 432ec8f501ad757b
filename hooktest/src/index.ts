/**
 * @charmhook/hooktest
 *
 * Helpers for testing charms built on @charmhook/hook without an agent.
 */

export { FakeToolRunner, type ToolCall } from "./runner.js";
export { runHook, hookEnvironment, type RunHookParams, type RunHookResult } from "./run-hook.js";
