/**
 * Unit tests for the declaration, environment and wire schemas.
 */

import { describe, it, expect } from "vitest";
import { HookEnvironmentSchema } from "./env.js";
import { relationIdName, unitService } from "./ids.js";
import { ConfigOptionSchema, RelationDeclarationSchema } from "./metadata.js";
import { ToolResponseSchema } from "./wire.js";

describe("RelationDeclarationSchema", () => {
  it("should reject an unknown role", () => {
    expect(RelationDeclarationSchema.safeParse({ name: "db", role: "client", interface: "mysql" }).success).toBe(false);
  });

  it("should reject a negative limit", () => {
    const parsed = RelationDeclarationSchema.safeParse({ name: "db", role: "requirer", interface: "mysql", limit: -1 });
    expect(parsed.success).toBe(false);
  });
});

describe("ConfigOptionSchema", () => {
  it.each([
    { type: "string", default: "x" },
    { type: "int", default: 3 },
    { type: "float", default: 0.5 },
    { type: "boolean", default: true },
    { type: "int" },
  ])("should accept $type with a matching default", (option) => {
    expect(ConfigOptionSchema.safeParse(option).success).toBe(true);
  });

  it("should report a mismatched default on the default field", () => {
    const parsed = ConfigOptionSchema.safeParse({ type: "boolean", default: "yes" });
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0]?.path).toEqual(["default"]);
    expect(parsed.error?.issues[0]?.message).toBe("default does not match option type boolean");
  });
});

describe("HookEnvironmentSchema", () => {
  it("should reject an empty required variable", () => {
    const parsed = HookEnvironmentSchema.safeParse({
      JUJU_MODEL_UUID: "uuid-1",
      JUJU_UNIT_NAME: "",
      CHARM_DIR: "/srv/charm",
      JUJU_CONTEXT_ID: "ctx-1",
      JUJU_AGENT_SOCKET: "nats://127.0.0.1:4222",
    });
    expect(parsed.success).toBe(false);
  });
});

describe("ToolResponseSchema", () => {
  it("should default missing output to empty strings", () => {
    expect(ToolResponseSchema.parse({ ok: true, result: { code: 0 } })).toEqual({
      ok: true,
      result: { code: 0, stdout: "", stderr: "" },
    });
  });

  it("should require a message on an error reply", () => {
    expect(ToolResponseSchema.safeParse({ ok: false, error: {} }).success).toBe(false);
  });
});

describe("ids", () => {
  it("should split unit and relation ids", () => {
    expect(unitService("mysql/0")).toBe("mysql");
    expect(unitService("mysql")).toBe("mysql");
    expect(relationIdName("db:4")).toBe("db");
    expect(relationIdName("db")).toBe("db");
  });
});
