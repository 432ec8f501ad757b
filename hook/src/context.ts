/**
 * Hook context: what one hook invocation knows about the unit it runs for.
 *
 * The context is built from the environment once per invocation. Relation
 * membership and settings for every declared relation are fetched up front
 * and frozen, so all handlers in the invocation see the same view.
 */

import { join } from "node:path";
import { z } from "zod";
import {
  COMMAND_PREFIX,
  ENV_AGENT_SOCKET,
  ENV_CHARM_DIR,
  ENV_CONTEXT_ID,
  ENV_MODEL_UUID,
  ENV_RELATION_ID,
  ENV_RELATION_NAME,
  ENV_REMOTE_UNIT,
  ENV_UNIT_NAME,
  HookEnvironmentSchema,
  HookError,
  RELATION_BROKEN_SUFFIX,
  RELATION_ENV_VARS,
  REQUIRED_ENV_VARS,
  errorMessage,
  isUnimplemented,
} from "@charmhook/core";
import type { RelationId, UnitId } from "@charmhook/core";
import type { HookConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { Registry } from "./registry.js";
import { ExecToolRunner, runJson, type ToolRunner } from "./runner.js";
import { connectSocketToolRunner } from "./socket-runner.js";
import { DiskState, type PersistentState } from "./state.js";

const LOG_PREFIX = "charmhook:context";

export type RelationSettings = Readonly<Record<string, string>>;

export type RelationUnits = ReadonlyMap<UnitId, RelationSettings>;

export type UnitStatus = "maintenance" | "blocked" | "waiting" | "active";

export interface ContextInit {
  uuid?: string;
  unit?: UnitId;
  charmDir?: string;
  hookName?: string;
  relationName?: string;
  relationId?: RelationId;
  remoteUnit?: UnitId;
  runCommandName?: string;
  runCommandArgs?: string[];
  stateDir?: string;
  runner: ToolRunner;
  log?: Logger;
  relationIds?: Map<string, RelationId[]>;
  relations?: Map<RelationId, Map<UnitId, Record<string, string>>>;
}

const StringListSchema = z.array(z.string()).nullable();
const SettingsSchema = z.record(z.string()).nullable();
const ConfigSchema = z.record(z.unknown()).nullable();

/**
 * Context holds the context for a single hook or command invocation.
 */
export class Context {
  /** Model UUID */
  readonly uuid: string;
  /** Name of the unit the hook runs for, e.g. "wordpress/0" */
  readonly unit: UnitId;
  readonly charmDir: string;
  /** Name of the running hook; empty in command mode */
  readonly hookName: string;
  /** Set for relation hooks only */
  readonly relationName?: string;
  readonly relationId?: RelationId;
  /** Unit that triggered a relation hook; absent for relation-broken */
  readonly remoteUnit?: UnitId;
  /** Set when the invocation runs a registered command instead of a hook */
  readonly runCommandName?: string;
  readonly runCommandArgs: readonly string[];
  /** Directory persistent state is stored in */
  readonly stateDir: string;
  readonly runner: ToolRunner;
  readonly log: Logger;
  /** Ids of the current instances of every declared relation */
  readonly relationIds: ReadonlyMap<string, readonly RelationId[]>;
  /** Members and their settings for every relation instance */
  readonly relations: ReadonlyMap<RelationId, RelationUnits>;

  constructor(init: ContextInit) {
    this.uuid = init.uuid ?? "";
    this.unit = init.unit ?? "";
    this.charmDir = init.charmDir ?? "";
    this.hookName = init.hookName ?? "";
    this.relationName = init.relationName;
    this.relationId = init.relationId;
    this.remoteUnit = init.remoteUnit;
    this.runCommandName = init.runCommandName;
    this.runCommandArgs = Object.freeze([...(init.runCommandArgs ?? [])]);
    this.stateDir = init.stateDir ?? "";
    this.runner = init.runner;
    this.log = init.log ?? {};

    const relationIds = new Map<string, readonly RelationId[]>();
    for (const [name, ids] of init.relationIds ?? []) {
      relationIds.set(name, Object.freeze([...ids]));
    }
    const relations = new Map<RelationId, RelationUnits>();
    for (const [id, units] of init.relations ?? []) {
      const frozen = new Map<UnitId, RelationSettings>();
      for (const [unit, settings] of units) {
        frozen.set(unit, Object.freeze({ ...settings }));
      }
      relations.set(id, frozen);
    }
    this.relationIds = relationIds;
    this.relations = relations;
  }

  /** Reports whether the running hook is a relation hook. */
  isRelationHook(): boolean {
    return this.relationName !== undefined;
  }

  /** Ids of the current instances of the named relation. */
  relationIdsFor(relationName: string): readonly RelationId[] {
    return this.relationIds.get(relationName) ?? [];
  }

  /** Units in the given relation instance, sorted. */
  relationUnits(id: RelationId): UnitId[] {
    return [...(this.relations.get(id)?.keys() ?? [])].sort();
  }

  /**
   * Returns the value with the given key set by the remote unit of the
   * current relation hook, or "" when it is unset.
   */
  getRelation(key: string): string {
    return this.getAllRelation()[key] ?? "";
  }

  /** All settings of the remote unit of the current relation hook. */
  getAllRelation(): RelationSettings {
    const { id, unit } = this.requireRemote("getAllRelation");
    return this.relations.get(id)?.get(unit) ?? {};
  }

  /** Returns the value with the given key set by a unit in a relation, or "". */
  getRelationUnit(id: RelationId, unit: UnitId, key: string): string {
    return this.relations.get(id)?.get(unit)?.[key] ?? "";
  }

  /**
   * Sets settings of the local unit in the current relation. An empty
   * value removes the key.
   */
  async setRelation(settings: Record<string, string>): Promise<void> {
    if (this.relationId === undefined) {
      throw notRelationHook("setRelation");
    }
    await this.setRelationWithId(this.relationId, settings);
  }

  /** Sets settings of the local unit in the given relation instance. */
  async setRelationWithId(id: RelationId, settings: Record<string, string>): Promise<void> {
    const pairs = Object.entries(settings).map(([key, value]) => `${key}=${value}`);
    if (pairs.length === 0) return;
    await this.runner.run("relation-set", "-r", id, ...pairs);
  }

  /** Value of one charm config option, or null when it has no value. */
  async getConfig(key: string): Promise<unknown> {
    return runJson(this.runner, "config-get", key);
  }

  async getAllConfig(): Promise<Record<string, unknown>> {
    return ConfigSchema.parse(await runJson(this.runner, "config-get")) ?? {};
  }

  privateAddress(): Promise<string> {
    return this.unitGet("private-address");
  }

  publicAddress(): Promise<string> {
    return this.unitGet("public-address");
  }

  async openPort(port: number, proto: "tcp" | "udp" = "tcp"): Promise<void> {
    await this.runner.run("open-port", `${port}/${proto}`);
  }

  async closePort(port: number, proto: "tcp" | "udp" = "tcp"): Promise<void> {
    await this.runner.run("close-port", `${port}/${proto}`);
  }

  /**
   * Sets the workload status shown for the unit. Agents without status
   * support are tolerated.
   */
  async setStatus(status: UnitStatus, message = ""): Promise<void> {
    try {
      await this.runner.run("status-set", status, message);
    } catch (err) {
      if (!isUnimplemented(err)) throw err;
      this.log.warn?.({ status, message }, `${LOG_PREFIX}:setStatus - status-set not supported by agent`);
    }
  }

  /** Logs a message tagged with the hook name. */
  logf(message: string, ctx: Record<string, unknown> = {}): void {
    this.log.info?.({ ...ctx, hook: this.hookName || undefined, unit: this.unit || undefined }, message);
  }

  /** Releases the tool runner's connection. */
  close(): Promise<void> {
    return this.runner.close();
  }

  private async unitGet(key: string): Promise<string> {
    return z.string().parse(await runJson(this.runner, "unit-get", key));
  }

  private requireRemote(method: string): { id: RelationId; unit: UnitId } {
    if (this.relationId === undefined || this.remoteUnit === undefined) {
      throw notRelationHook(method);
    }
    return { id: this.relationId, unit: this.remoteUnit };
  }
}

function notRelationHook(method: string): HookError {
  return new HookError({
    code: "PRECONDITION_FAILED",
    message: `${LOG_PREFIX}:${method} - Not running a relation hook with a remote unit`,
  });
}

// ── Construction from the environment ───────────────────────────────

export interface NewContextParams {
  registry: Registry;
  /** First argument: hook name or `cmd-<path>` */
  hookName: string;
  /** Remaining arguments */
  args: string[];
  env: Record<string, string | undefined>;
  config: HookConfig;
  /** Overrides config.stateDir */
  stateDir?: string;
  /** Use this runner instead of building one from config */
  runner?: ToolRunner;
  log?: Logger;
}

export interface NewContextResult {
  ctxt: Context;
  /** Absent in command mode */
  state?: PersistentState;
}

/**
 * Creates a hook context from the environment, fetching the ids, units and
 * settings of every relation declared in the registry.
 *
 * The caller is responsible for calling close on the returned context.
 */
export async function newContextFromEnvironment(params: NewContextParams): Promise<NewContextResult> {
  const { registry, hookName, args, config } = params;
  const log = params.log ?? {};

  if (hookName === "") {
    throw precondition("No hook name provided");
  }
  if (hookName.startsWith(COMMAND_PREFIX)) {
    return {
      ctxt: new Context({
        runCommandName: hookName.slice(COMMAND_PREFIX.length),
        runCommandArgs: args,
        runner: params.runner ?? new ExecToolRunner({ executable: config.toolExecutable }),
        log,
      }),
    };
  }
  if (args.length !== 0) {
    throw precondition(`Unexpected extra arguments running hook "${hookName}": ${args.join(" ")}`, {
      hook: hookName,
      args,
    });
  }

  const vars: string[] = [...REQUIRED_ENV_VARS];
  if (params.env[ENV_RELATION_NAME]) {
    vars.push(...RELATION_ENV_VARS);
    if (!hookName.endsWith(RELATION_BROKEN_SUFFIX)) {
      vars.push(ENV_REMOTE_UNIT);
    }
  }
  for (const v of vars) {
    if (!params.env[v]) {
      throw precondition(`Required environment variable "${v}" not set`, { variable: v });
    }
  }
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(params.env)) {
    if (value) present[key] = value;
  }
  const env = HookEnvironmentSchema.parse(present);

  const runner =
    params.runner ??
    (config.runner === "socket"
      ? await connectSocketToolRunner({
          address: env[ENV_AGENT_SOCKET],
          contextId: env[ENV_CONTEXT_ID],
          dir: env[ENV_CHARM_DIR],
          config: { subject: config.toolSubject, timeoutMs: config.toolTimeoutMs },
          log,
        })
      : new ExecToolRunner({ executable: config.toolExecutable, cwd: env[ENV_CHARM_DIR] }));

  let snapshot: RelationSnapshot;
  try {
    snapshot = await fetchRelations(runner, Object.keys(registry.registeredRelations()));
  } catch (err) {
    await runner.close();
    throw err;
  }

  const stateDir = params.stateDir ?? config.stateDir ?? join(env[ENV_CHARM_DIR], "..", "state");
  const ctxt = new Context({
    uuid: env[ENV_MODEL_UUID],
    unit: env[ENV_UNIT_NAME],
    charmDir: env[ENV_CHARM_DIR],
    hookName,
    relationName: env[ENV_RELATION_NAME],
    relationId: env[ENV_RELATION_ID],
    remoteUnit: env[ENV_REMOTE_UNIT],
    stateDir,
    runner,
    log,
    relationIds: snapshot.relationIds,
    relations: snapshot.relations,
  });
  log.debug?.(
    { hook: hookName, relations: snapshot.relationIds.size, instances: snapshot.relations.size },
    `${LOG_PREFIX}:newContextFromEnvironment - Context ready`
  );
  return { ctxt, state: new DiskState(stateDir) };
}

interface RelationSnapshot {
  relationIds: Map<string, RelationId[]>;
  relations: Map<RelationId, Map<UnitId, Record<string, string>>>;
}

/**
 * Fetches instance ids, member units and unit settings for every named
 * relation, one tool call at a time.
 */
export async function fetchRelations(runner: ToolRunner, names: string[]): Promise<RelationSnapshot> {
  const relationIds = new Map<string, RelationId[]>();
  const relations = new Map<RelationId, Map<UnitId, Record<string, string>>>();
  for (const name of names) {
    const ids = await toolCall(`Cannot get relation ids for relation "${name}"`, async () =>
      StringListSchema.parse(await runJson(runner, "relation-ids", name)) ?? []
    );
    relationIds.set(name, ids);
    for (const id of ids) {
      const unitIds = await toolCall(`Cannot get unit ids for relation id "${id}"`, async () =>
        StringListSchema.parse(await runJson(runner, "relation-list", "-r", id)) ?? []
      );
      const units = new Map<UnitId, Record<string, string>>();
      for (const unit of unitIds) {
        const settings = await toolCall(`Cannot get settings for relation ${id}, unit ${unit}`, async () =>
          SettingsSchema.parse(await runJson(runner, "relation-get", "-r", id, "-", unit)) ?? {}
        );
        units.set(unit, settings);
      }
      relations.set(id, units);
    }
  }
  return { relationIds, relations };
}

async function toolCall<T>(what: string, f: () => Promise<T>): Promise<T> {
  try {
    return await f();
  } catch (err) {
    throw new HookError({
      code: isUnimplemented(err) ? "UNIMPLEMENTED" : "TOOL_FAILED",
      message: `${LOG_PREFIX}:fetchRelations - ${what}: ${errorMessage(err)}`,
      cause: err,
    });
  }
}

function precondition(message: string, details?: Record<string, unknown>): HookError {
  return new HookError({
    code: "PRECONDITION_FAILED",
    message: `${LOG_PREFIX}:newContextFromEnvironment - ${message}`,
    details,
  });
}
