import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { createProgram } from "../../src/cli.js";
import { defaultConfig, type Config } from "../../src/config/config.js";
import { createContext, type AppContext } from "../../src/context.js";
import { createTestDb } from "../helpers/test-db.js";
import { RecordingLogger, TEST_SECRET } from "../helpers/fakes.js";

const env = { NO_COLOR: process.env.NO_COLOR, FIELDTASK_CONFIG_DIR: process.env.FIELDTASK_CONFIG_DIR };

function restore(key: keyof typeof env): void {
  const value = env[key];
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
}

describe("CLI", () => {
  let config: Config;
  let ctx: AppContext;
  let output: string[];

  beforeAll(() => {
    process.env.NO_COLOR = "1";
  });

  afterAll(() => {
    restore("NO_COLOR");
  });

  beforeEach(() => {
    config = { ...defaultConfig(), token_secret: TEST_SECRET };
    const context = createContext(config, new RecordingLogger(), createTestDb());
    ctx = { ...context, close: async () => {} };
    output = [];
  });

  afterEach(async () => {
    await ctx.db.destroy();
  });

  async function run(...args: string[]): Promise<void> {
    const program = createProgram({
      config,
      write: (text) => output.push(text),
      logger: new RecordingLogger(),
      openContext: () => ctx,
    });
    await program.parseAsync(args, { from: "user" });
  }

  it("adds and lists users", async () => {
    await run("user", "add", "admin", "admin@example.com", "--role", "admin");
    await run("user", "add", "member1", "member1@example.com");
    const [admin, member1] = await ctx.identity.listUsers();

    expect(output).toEqual([
      `Created admin  admin  admin@example.com  ${admin?.id}`,
      `Created member1  member  member1@example.com  ${member1?.id}`,
    ]);

    output = [];
    await run("user", "list");
    expect(output).toEqual([
      [
        `admin  admin  admin@example.com  ${admin?.id}`,
        `member1  member  member1@example.com  ${member1?.id}`,
      ].join("\n"),
    ]);
  });

  it("prints users as JSON", async () => {
    await run("user", "add", "member1", "member1@example.com", "--json");
    const user = await ctx.identity.listUsers();
    expect(JSON.parse(output[0] ?? "")).toEqual(user[0]);
  });

  it("says when there are no users", async () => {
    await run("user", "list");
    expect(output).toEqual(["No users."]);
  });

  it("rejects invalid input", async () => {
    await expect(run("user", "add", "bad name", "x@example.com")).rejects.toThrow(
      "Username may only contain letters, digits, '.', '_' and '-'.",
    );
    await expect(run("user", "add", "ok", "x@example.com", "--role", "owner")).rejects.toMatchObject({
      code: "commander.invalidArgument",
    });
  });

  it("disables users", async () => {
    await run("user", "add", "member1", "member1@example.com");
    output = [];
    await run("user", "disable", "member1");
    const [user] = await ctx.identity.listUsers();
    expect(output).toEqual([`Disabled member1  member  member1@example.com  ${user?.id} (disabled)`]);

    await expect(run("user", "disable", "ghost")).rejects.toThrow("User not found: ghost");
  });

  it("issues tokens that authenticate", async () => {
    await run("user", "add", "member1", "member1@example.com");
    output = [];
    await run("token", "member1");

    expect(output).toHaveLength(2);
    const principal = await ctx.identity.authenticate(output[0] ?? "");
    expect(principal.username).toBe("member1");
    expect(output[1]).toMatch(/^expires \d{4}-\d{2}-\d{2}T\S+Z$/);
  });

  it("runs a deadline scan", async () => {
    await run("scan");
    expect(output).toEqual(["Scanned 0 task(s): 0 alerted, 0 failed."]);

    output = [];
    await run("scan", "--json");
    expect(JSON.parse(output[0] ?? "")).toEqual({ scanned: 0, alerted: [], failed: [] });
  });

  describe("config", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "fieldtask-cli-"));
      process.env.FIELDTASK_CONFIG_DIR = dir;
    });

    afterEach(() => {
      restore("FIELDTASK_CONFIG_DIR");
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("prints the config path", async () => {
      await run("config", "path");
      expect(output).toEqual([path.join(dir, "config.toml")]);
    });

    it("writes a default config once", async () => {
      const configPath = path.join(dir, "config.toml");
      await run("config", "init");
      await run("config", "init");

      expect(output).toEqual([
        `Created ${configPath}`,
        `Config file already exists at ${configPath}`,
      ]);
      expect(fs.readFileSync(configPath, "utf-8")).toContain("deadline_lookahead_hours = 24");
    });
  });
});
