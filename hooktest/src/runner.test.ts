/**
 * Unit tests for FakeToolRunner's answers to hook tools.
 */

import { describe, it, expect } from "vitest";
import { runJson } from "@charmhook/hook";
import { FakeToolRunner } from "./runner.js";

describe("FakeToolRunner", () => {
  describe("relations", () => {
    it("should list relation ids of one relation, sorted", async () => {
      const runner = new FakeToolRunner()
        .addRelation("db:7")
        .addRelationUnit("db:2", "mysql/0")
        .addRelationUnit("website:1", "proxy/0");

      await expect(runJson(runner, "relation-ids", "db")).resolves.toEqual(["db:2", "db:7"]);
      await expect(runJson(runner, "relation-ids", "cache")).resolves.toEqual([]);
    });

    it("should list units and read their settings", async () => {
      const runner = new FakeToolRunner()
        .addRelationUnit("db:2", "mysql/1", { host: "10.0.0.6" })
        .addRelationUnit("db:2", "mysql/0", { host: "10.0.0.5", port: "3306" });

      await expect(runJson(runner, "relation-list", "-r", "db:2")).resolves.toEqual(["mysql/0", "mysql/1"]);
      await expect(runJson(runner, "relation-get", "-r", "db:2", "-", "mysql/0")).resolves.toEqual({
        host: "10.0.0.5",
        port: "3306",
      });
      await expect(runJson(runner, "relation-get", "-r", "db:2", "port", "mysql/0")).resolves.toBe("3306");
      await expect(runJson(runner, "relation-get", "-r", "db:2", "port", "mysql/1")).resolves.toBeNull();
    });

    it("should fail to read settings of a unit not in the relation", async () => {
      const runner = new FakeToolRunner().addRelation("db:2");
      await expect(runJson(runner, "relation-get", "-r", "db:2", "-", "mysql/9")).rejects.toMatchObject({
        code: "TOOL_FAILED",
        message: 'cannot read settings for unit "mysql/9" in relation "db:2"',
      });
    });

    it("should record local settings and delete keys set to empty", async () => {
      const runner = new FakeToolRunner("app/0").addRelationUnit("db:2", "mysql/0");
      await runner.run("relation-set", "-r", "db:2", "user=app", "schema=main");
      await runner.run("relation-set", "-r", "db:2", "schema=");

      expect(runner.localSettings.get("db:2")).toEqual({ user: "app" });
      await expect(runJson(runner, "relation-get", "-r", "db:2", "-", "app/0")).resolves.toEqual({ user: "app" });
    });

    it("should forget a removed unit", async () => {
      const runner = new FakeToolRunner().addRelationUnit("db:2", "mysql/0").removeRelationUnit("db:2", "mysql/0");
      await expect(runJson(runner, "relation-list", "-r", "db:2")).resolves.toEqual([]);
    });

    it("should require a relation id", async () => {
      await expect(new FakeToolRunner().run("relation-list")).rejects.toMatchObject({
        code: "TOOL_FAILED",
        message: "no relation id specified",
      });
    });
  });

  describe("unit tools", () => {
    it("should answer config-get for one key or all", async () => {
      const runner = new FakeToolRunner();
      runner.config = { port: 8080, debug: false };

      await expect(runJson(runner, "config-get", "port")).resolves.toBe(8080);
      await expect(runJson(runner, "config-get", "missing")).resolves.toBeNull();
      await expect(runJson(runner, "config-get")).resolves.toEqual({ port: 8080, debug: false });
    });

    it("should answer unit-get for the addresses", async () => {
      const runner = new FakeToolRunner();
      await expect(runJson(runner, "unit-get", "private-address")).resolves.toBe("10.0.0.1");
      await expect(runJson(runner, "unit-get", "public-address")).resolves.toBe("203.0.113.1");
      await expect(runJson(runner, "unit-get", "zone")).rejects.toMatchObject({ code: "TOOL_FAILED" });
    });

    it("should track ports and status", async () => {
      const runner = new FakeToolRunner();
      await runner.run("open-port", "80/tcp");
      await runner.run("open-port", "443/tcp");
      await runner.run("close-port", "80/tcp");
      await runner.run("status-set", "maintenance", "installing");

      expect([...runner.openPorts]).toEqual(["443/tcp"]);
      expect(runner.status).toEqual({ status: "maintenance", message: "installing" });
    });
  });

  describe("failures", () => {
    it("should report unknown tools as unimplemented", async () => {
      await expect(new FakeToolRunner().run("leader-get")).rejects.toMatchObject({
        code: "UNIMPLEMENTED",
        message: 'bad request: unknown command "leader-get"',
      });
    });

    it("should pretend not to know tools marked unimplemented", async () => {
      const runner = new FakeToolRunner();
      runner.unimplemented.add("status-set");
      await expect(runner.run("status-set", "active")).rejects.toMatchObject({ code: "UNIMPLEMENTED" });
    });

    it("should fail a tool with the configured stderr", async () => {
      const runner = new FakeToolRunner().failOn("config-get", "error: permission denied");
      await expect(runner.run("config-get")).rejects.toMatchObject({ code: "TOOL_FAILED", message: "permission denied" });
    });
  });

  it("should record every call in order", async () => {
    const runner = new FakeToolRunner();
    await runner.run("open-port", "80/tcp");
    await runJson(runner, "config-get", "port");
    await runner.close();

    expect(runner.calls).toEqual([
      ["open-port", "80/tcp"],
      ["config-get", "--format", "json", "port"],
    ]);
    expect(runner.callsTo("open-port")).toEqual([["open-port", "80/tcp"]]);
    expect(runner.closed).toBe(true);
  });
});
