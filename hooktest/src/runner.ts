/**
 * Fake hook tool runner that plays the agent's part in tests: it keeps
 * relations, unit settings, charm config, addresses, ports and status in
 * memory and answers hook tools from them.
 */

import { relationIdName } from "@charmhook/core";
import type { RelationId, UnitId } from "@charmhook/core";
import { classifyToolError, type ToolRunner } from "@charmhook/hook";

export type ToolCall = [cmd: string, ...args: string[]];

interface FakeRelation {
  units: Map<UnitId, Record<string, string>>;
}

export class FakeToolRunner implements ToolRunner {
  /** The unit the fake agent is serving */
  readonly unit: UnitId;
  /** Every call made, in order */
  readonly calls: ToolCall[] = [];
  /** Settings the local unit has set, per relation id */
  readonly localSettings = new Map<RelationId, Record<string, string>>();
  readonly openPorts = new Set<string>();
  config: Record<string, unknown> = {};
  addresses: { "private-address": string; "public-address": string } = {
    "private-address": "10.0.0.1",
    "public-address": "203.0.113.1",
  };
  status?: { status: string; message: string };
  /** Tools the fake agent pretends not to know */
  readonly unimplemented = new Set<string>();
  closed = false;

  private relations = new Map<RelationId, FakeRelation>();
  private failures = new Map<string, string>();

  constructor(unit: UnitId = "test/0") {
    this.unit = unit;
  }

  /** Adds a remote unit, with its settings, to a relation instance. */
  addRelationUnit(id: RelationId, unit: UnitId, settings: Record<string, string> = {}): this {
    const rel = this.relations.get(id) ?? { units: new Map() };
    rel.units.set(unit, { ...settings });
    this.relations.set(id, rel);
    return this;
  }

  /** Adds a relation instance with no members yet. */
  addRelation(id: RelationId): this {
    if (!this.relations.has(id)) {
      this.relations.set(id, { units: new Map() });
    }
    return this;
  }

  removeRelationUnit(id: RelationId, unit: UnitId): this {
    this.relations.get(id)?.units.delete(unit);
    return this;
  }

  /** Makes the named tool fail with the given stderr text. */
  failOn(cmd: string, stderr: string): this {
    this.failures.set(cmd, stderr);
    return this;
  }

  /** Calls made to the named tool. */
  callsTo(cmd: string): ToolCall[] {
    return this.calls.filter(([name]) => name === cmd);
  }

  async run(cmd: string, ...args: string[]): Promise<Buffer> {
    this.calls.push([cmd, ...args]);
    if (this.unimplemented.has(cmd)) {
      throw classifyToolError(cmd, `error: bad request: unknown command "${cmd}"`);
    }
    const failure = this.failures.get(cmd);
    if (failure !== undefined) {
      throw classifyToolError(cmd, failure);
    }
    const { positional, relationId } = parseArgs(args);
    switch (cmd) {
      case "relation-ids": {
        const [name = ""] = positional;
        const ids = [...this.relations.keys()].filter((id) => relationIdName(id) === name).sort();
        return json(ids);
      }
      case "relation-list": {
        const rel = this.relations.get(requireRelationId(cmd, relationId));
        return json([...(rel?.units.keys() ?? [])].sort());
      }
      case "relation-get": {
        const id = requireRelationId(cmd, relationId);
        const unit = positional[1] ?? "";
        const settings =
          unit === this.unit ? this.localSettings.get(id) : this.relations.get(id)?.units.get(unit);
        if (!settings) {
          throw classifyToolError(cmd, `error: cannot read settings for unit "${unit}" in relation "${id}"`);
        }
        const key = positional[0];
        return json(key === undefined || key === "-" ? settings : settings[key] ?? null);
      }
      case "relation-set": {
        const id = requireRelationId(cmd, relationId);
        const settings = { ...(this.localSettings.get(id) ?? {}) };
        for (const pair of positional) {
          const eq = pair.indexOf("=");
          if (eq < 0) {
            throw classifyToolError(cmd, `error: expected "key=value", got "${pair}"`);
          }
          const key = pair.slice(0, eq);
          const value = pair.slice(eq + 1);
          if (value === "") {
            delete settings[key];
          } else {
            settings[key] = value;
          }
        }
        this.localSettings.set(id, settings);
        return Buffer.alloc(0);
      }
      case "config-get": {
        const [key] = positional;
        return json(key === undefined ? this.config : this.config[key] ?? null);
      }
      case "unit-get": {
        const [key = ""] = positional;
        if (key !== "private-address" && key !== "public-address") {
          throw classifyToolError(cmd, `error: unknown setting "${key}"`);
        }
        return json(this.addresses[key]);
      }
      case "open-port":
        this.openPorts.add(positional[0] ?? "");
        return Buffer.alloc(0);
      case "close-port":
        this.openPorts.delete(positional[0] ?? "");
        return Buffer.alloc(0);
      case "status-set":
        this.status = { status: positional[0] ?? "", message: positional[1] ?? "" };
        return Buffer.alloc(0);
      default:
        throw classifyToolError(cmd, `error: bad request: unknown command "${cmd}"`);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function parseArgs(args: string[]): { positional: string[]; relationId?: string } {
  const positional: string[] = [];
  let relationId: string | undefined;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--format") {
      i++;
    } else if (arg === "-r") {
      relationId = args[i + 1];
      i++;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }
  return { positional, relationId };
}

function requireRelationId(cmd: string, id: string | undefined): RelationId {
  if (id === undefined) {
    throw classifyToolError(cmd, "error: no relation id specified");
  }
  return id;
}

function json(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value), "utf-8");
}
