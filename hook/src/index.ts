/**
 * @charmhook/hook
 *
 * Registry, context and dispatch for charm hook executables.
 */

// Registry
export {
  Registry,
  joinNamespace,
  type HookFunc,
  type ContextSetter,
  type StateRef,
  type HookEntry,
  type StateEntry,
} from "./registry.js";

// Context
export {
  Context,
  newContextFromEnvironment,
  fetchRelations,
  type ContextInit,
  type NewContextParams,
  type NewContextResult,
  type RelationSettings,
  type RelationUnits,
  type UnitStatus,
} from "./context.js";

// Dispatch
export { main, loadState, saveState, usageError } from "./main.js";
export { runMain, type RunMainOptions } from "./run.js";

// Commands
export { CommandTask, untilAborted, waitWithSignals, type CommandFunc } from "./command.js";

// Tool runners
export {
  ExecToolRunner,
  classifyToolError,
  runJson,
  type ToolRunner,
  type ExecToolRunnerOptions,
} from "./runner.js";
export {
  SocketToolRunner,
  connectSocketToolRunner,
  type ToolRpcConnection,
  type SocketToolRunnerConfig,
} from "./socket-runner.js";

// Persistent state
export { DiskState, MemoryState, type PersistentState } from "./state.js";

// Config
export { loadConfig, defaultHookConfig, HOOK_ENV_FILE, type HookConfig, type ToolRunnerKind } from "./config.js";

// Logging
export {
  createNodeJSLogger,
  silentLogger,
  type Logger,
  type LoggerFactory,
  type LogLevel,
  type LogMethod,
} from "./logger.js";

// Re-export core types for convenience
export {
  HookError,
  isHookError,
  isUnimplemented,
  type HookErrorCode,
  type RelationId,
  type UnitId,
  type RelationDeclaration,
  type ResourceDeclaration,
  type ConfigOption,
} from "@charmhook/core";
