#!/usr/bin/env node
import { fileURLToPath } from "url";
import fs from "fs";
import path from "path";
import { Command, Option } from "commander";
import {
  DEFAULT_CONFIG_TOML,
  getConfigPath,
  loadConfig,
  type Config,
} from "./config/config.js";
import { createContext, type AppContext } from "./context.js";
import { isAppError } from "./errors.js";
import { bold, dim, green, yellow } from "./format/colors.js";
import { createLogger, type Logger } from "./log.js";
import { startServer } from "./server/index.js";
import { ROLES, type Role, type User } from "./users/types.js";
import { createUserSchema, parseInput } from "./validation.js";
import { VERSION } from "./version.js";

function formatUser(user: User): string {
  const role = user.role === "admin" ? yellow(user.role) : user.role;
  const state = user.enabled ? "" : ` ${dim("(disabled)")}`;
  return `${bold(user.username)}  ${role}  ${user.email}  ${dim(user.id)}${state}`;
}

export interface ProgramOptions {
  config?: Config;
  write?: (text: string) => void;
  logger?: Logger;
  /** Builds the app context on first use; tests inject an in-memory one. */
  openContext?: () => AppContext;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const config = options.config ?? loadConfig();
  const write = options.write ?? ((t: string) => process.stdout.write(t + "\n"));
  const logger = options.logger ?? createLogger(config.log_level);
  const openContext = options.openContext ?? (() => createContext(config, logger));

  let ctx: AppContext | null = null;
  const context = (): AppContext => {
    ctx ??= openContext();
    return ctx;
  };

  const program = new Command("fieldtask")
    .description("Task tracker API for field teams")
    .version(VERSION);

  program.configureOutput({
    writeOut: write,
    writeErr: write,
  });
  program.exitOverride();

  program.hook("postAction", async () => {
    if (ctx) {
      await ctx.close();
      ctx = null;
    }
  });

  program
    .command("serve")
    .description("Start the HTTP API and the deadline scanner (Ctrl+C to stop)")
    .option("--port <port>", "Port to listen on")
    .action(async (opts: { port?: string }) => {
      const port = opts.port ? parseInt(opts.port, 10) : config.port;
      if (!Number.isInteger(port) || port <= 0 || port >= 65536) {
        write(`Invalid port: ${opts.port}`);
        process.exitCode = 1;
        return;
      }
      const server = await startServer({ ...config, port }, logger);

      await new Promise<void>((resolve) => {
        const shutdown = () => {
          logger.info("shutting down");
          server.close().then(resolve, (err: unknown) => {
            logger.error("shutdown failed", { error: err });
            process.exitCode = 1;
            resolve();
          });
        };
        process.once("SIGTERM", shutdown);
        process.once("SIGINT", shutdown);
      });
    });

  program
    .command("scan")
    .description("Run the deadline scanner once (for an external scheduler)")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      const result = await context().scanner.scan();
      if (opts.json) {
        write(JSON.stringify(result, null, 2));
        return;
      }
      write(
        `Scanned ${result.scanned} task(s): ${green(`${result.alerted.length} alerted`)}, ${result.failed.length} failed.`,
      );
    });

  const userCmd = program.command("user").description("Manage team members");

  userCmd
    .command("add <username> <email>")
    .description("Create a user (use --role admin to bootstrap the first admin)")
    .addOption(new Option("-r, --role <role>", "Role").choices(ROLES).default("member"))
    .option("--json", "Output as JSON")
    .action(async (username: string, email: string, opts: { role: Role; json?: boolean }) => {
      const input = parseInput(createUserSchema, { username, email, role: opts.role });
      const user = await context().identity.createUser(input);
      write(opts.json ? JSON.stringify(user, null, 2) : `Created ${formatUser(user)}`);
    });

  userCmd
    .command("list")
    .description("List users")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      const users = await context().identity.listUsers();
      if (opts.json) {
        write(JSON.stringify(users, null, 2));
        return;
      }
      if (users.length === 0) {
        write("No users.");
        return;
      }
      write(users.map(formatUser).join("\n"));
    });

  userCmd
    .command("disable <username>")
    .description("Disable a user; their tokens stop working immediately")
    .action(async (username: string) => {
      const user = await context().identity.disableUser(username);
      write(`Disabled ${formatUser(user)}`);
    });

  program
    .command("token <username>")
    .description("Issue a bearer token for a user")
    .option("--json", "Output as JSON")
    .action(async (username: string, opts: { json?: boolean }) => {
      const issued = await context().identity.issueToken(username);
      if (opts.json) {
        write(JSON.stringify(issued, null, 2));
        return;
      }
      write(issued.token);
      write(dim(`expires ${issued.expires_at}`));
    });

  const configCmd = program.command("config").description("Manage configuration");

  configCmd
    .command("init")
    .description("Create a default config file with documented options")
    .action(() => {
      const configPath = getConfigPath();
      if (fs.existsSync(configPath)) {
        write(`Config file already exists at ${configPath}`);
        return;
      }
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, DEFAULT_CONFIG_TOML, { mode: 0o600 });
      write(`Created ${configPath}`);
    });

  configCmd
    .command("path")
    .description("Print the config file path")
    .action(() => {
      write(getConfigPath());
    });

  return program;
}

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    // Commander throws on --help, --version and usage errors.
    if (err instanceof Error && "exitCode" in err && typeof err.exitCode === "number") {
      process.exit(err.exitCode);
    }
    if (isAppError(err)) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

const currentFile = fileURLToPath(import.meta.url);
// Resolve symlinks so the npm bin shim counts as the entry point.
const entry = process.argv[1];
const isEntryPoint =
  entry !== undefined && fs.existsSync(entry) && currentFile === fs.realpathSync(entry);

if (isEntryPoint) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
