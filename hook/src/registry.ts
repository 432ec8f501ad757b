/**
 * Registry of hook handlers, commands, declarations and persistent state.
 *
 * A Registry is a handle: a namespace plus a reference to one store shared by
 * the root registry and every sub-registry derived from it. Modules each get
 * their own sub-registry, so their state and commands are kept under their
 * own path while lifecycle events stay flat and shared.
 */

import type { ZodType, ZodTypeAny, ZodTypeDef } from "zod";
import {
  ConfigOptionSchema,
  HookError,
  RelationDeclarationSchema,
  ResourceDeclarationSchema,
  WILDCARD_EVENT,
} from "@charmhook/core";
import type { ConfigOption, RelationDeclaration, ResourceDeclaration } from "@charmhook/core";
import type { CommandFunc } from "./command.js";
import type { Context } from "./context.js";

const LOG_PREFIX = "charmhook:registry";

/** Valid local name for a sub-registry or command: one path segment. */
const LOCAL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export type HookFunc = (ctxt: Context) => void | Promise<void>;

export type ContextSetter = (ctxt: Context) => void | Promise<void>;

/**
 * A mutable cell holding a module's persistent state. The dispatcher replaces
 * `value` with the saved value before any hook runs and saves whatever
 * `value` holds after the hooks complete.
 */
export interface StateRef<T> {
  value: T;
}

export interface HookEntry {
  /** Namespace of the registry the handler was registered through */
  namespace: string;
  run: HookFunc;
}

export interface StateEntry {
  namespace: string;
  ref: StateRef<unknown>;
  /** Validates loaded data; when absent the parsed JSON is used as is */
  schema?: ZodTypeAny;
}

interface RegistryStore {
  hooks: Map<string, HookEntry[]>;
  commands: Map<string, CommandFunc>;
  relations: Map<string, RelationDeclaration>;
  resources: Map<string, ResourceDeclaration>;
  config: Map<string, ConfigOption>;
  state: StateEntry[];
  contexts: ContextSetter[];
}

export class Registry {
  readonly namespace: string;
  private store: RegistryStore;

  /**
   * Creates a new root registry, or, given a parent, a sub-registry sharing
   * the parent's store (see newSubRegistry).
   */
  constructor(parent?: { registry: Registry; localName: string }) {
    if (parent) {
      checkLocalName("newSubRegistry", parent.localName);
      this.namespace = joinNamespace(parent.registry.namespace, parent.localName);
      this.store = parent.registry.store;
      return;
    }
    this.namespace = "";
    this.store = {
      hooks: new Map(),
      commands: new Map(),
      relations: new Map(),
      resources: new Map(),
      config: new Map(),
      state: [],
      contexts: [],
    };
  }

  /**
   * Registers f to be called when the hook with the given name runs.
   * Handlers for one hook run in registration order until one fails.
   * Handlers registered under "*" run after those of every hook.
   */
  register(name: string, f: HookFunc): void {
    if (name === "") {
      throw new HookError({
        code: "INVALID_NAME",
        message: `${LOG_PREFIX}:register - Empty hook name`,
      });
    }
    const entries = this.store.hooks.get(name) ?? [];
    entries.push({ namespace: this.namespace, run: f });
    this.store.hooks.set(name, entries);
  }

  /** Alias of register. */
  registerHook(name: string, f: HookFunc): void {
    this.register(name, f);
  }

  /**
   * Registers f to be called when the executable is invoked with
   * `cmd-<path>` as its first argument, where path is the name joined to
   * this registry's namespace. Registering the same path twice throws.
   */
  registerCommand(name: string, f: CommandFunc): void {
    checkLocalName("registerCommand", name);
    const path = joinNamespace(this.namespace, name);
    if (this.store.commands.has(path)) {
      throw new HookError({
        code: "DUPLICATE_COMMAND",
        message: `${LOG_PREFIX}:registerCommand - Command "${path}" is already registered`,
        details: { command: path },
      });
    }
    this.store.commands.set(path, f);
  }

  /**
   * Returns a sub-registry whose namespace is this one's joined with
   * localName. It shares everything registered with this registry.
   */
  newSubRegistry(localName: string): Registry {
    return new Registry({ registry: this, localName });
  }

  /**
   * Declares a relation. The context fetches ids, units and settings of
   * every declared relation on each hook run.
   */
  registerRelation(decl: RelationDeclaration): void {
    const parsed = RelationDeclarationSchema.parse(decl);
    registerUnique(this.store.relations, "registerRelation", "relation", parsed.name, parsed);
  }

  registerResource(decl: ResourceDeclaration): void {
    const parsed = ResourceDeclarationSchema.parse(decl);
    registerUnique(this.store.resources, "registerResource", "resource", parsed.name, parsed);
  }

  /** Declares a charm configuration option. */
  registerConfig(name: string, option: ConfigOption): void {
    if (name === "") {
      throw new HookError({
        code: "INVALID_NAME",
        message: `${LOG_PREFIX}:registerConfig - Empty config option name`,
      });
    }
    const parsed = ConfigOptionSchema.parse(option);
    registerUnique(this.store.config, "registerConfig", "config option", name, parsed);
  }

  /**
   * Registers a state cell, saved under this registry's namespace. A zod
   * schema, if given, validates what is loaded back.
   */
  registerState<T>(ref: StateRef<T>, schema?: ZodType<T, ZodTypeDef, unknown>): void {
    if (this.store.state.some((entry) => entry.namespace === this.namespace)) {
      throw new HookError({
        code: "REGISTRATION_CONFLICT",
        message: `${LOG_PREFIX}:registerState - State already registered for "${this.namespace}"`,
        details: { namespace: this.namespace },
      });
    }
    this.store.state.push({ namespace: this.namespace, ref, schema });
  }

  /**
   * Registers setter to be called with the context before any hooks run,
   * and registers ref as this namespace's persistent state.
   */
  registerContext<T>(setter: ContextSetter, ref: StateRef<T>, schema?: ZodType<T, ZodTypeDef, unknown>): void {
    this.registerState(ref, schema);
    this.store.contexts.push(setter);
  }

  /**
   * Registers the hooks every charm needs. Call it after everything else
   * has been registered.
   */
  registerMainHooks(): void {
    this.register("install", nop);
    this.register("start", nop);
  }

  // ── Lookups (dispatch and the packaging tool) ─────────────────────

  /** Names of all hooks with at least one handler, sorted. */
  registeredHooks(): string[] {
    return [...this.store.hooks.keys()].filter((name) => name !== WILDCARD_EVENT).sort();
  }

  /** Full paths of all registered commands, sorted. */
  registeredCommands(): string[] {
    return [...this.store.commands.keys()].sort();
  }

  registeredRelations(): Record<string, RelationDeclaration> {
    return sortedRecord(this.store.relations);
  }

  registeredResources(): Record<string, ResourceDeclaration> {
    return sortedRecord(this.store.resources);
  }

  registeredConfig(): Record<string, ConfigOption> {
    return sortedRecord(this.store.config);
  }

  /** Handlers for a hook, in registration order, without wildcard handlers. */
  hookEntries(name: string): readonly HookEntry[] {
    return this.store.hooks.get(name) ?? [];
  }

  command(path: string): CommandFunc | undefined {
    return this.store.commands.get(path);
  }

  stateEntries(): readonly StateEntry[] {
    return this.store.state;
  }

  contextSetters(): readonly ContextSetter[] {
    return this.store.contexts;
  }
}

/** Joins a namespace and a local name with "/". */
export function joinNamespace(namespace: string, name: string): string {
  return namespace === "" ? name : `${namespace}/${name}`;
}

function checkLocalName(method: string, name: string): void {
  if (!LOCAL_NAME_PATTERN.test(name)) {
    throw new HookError({
      code: "INVALID_NAME",
      message: `${LOG_PREFIX}:${method} - Invalid name "${name}"`,
      details: { name },
    });
  }
}

function registerUnique<T>(map: Map<string, T>, method: string, kind: string, name: string, value: T): void {
  const existing = map.get(name);
  if (existing !== undefined && JSON.stringify(existing) !== JSON.stringify(value)) {
    throw new HookError({
      code: "REGISTRATION_CONFLICT",
      message: `${LOG_PREFIX}:${method} - ${kind} "${name}" is already registered with different attributes`,
      details: { name, existing, value },
    });
  }
  map.set(name, value);
}

function sortedRecord<T>(map: Map<string, T>): Record<string, T> {
  return Object.fromEntries([...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function nop(): void {}
