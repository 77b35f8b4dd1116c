import fs from "fs";
import path from "path";
import os from "os";
import { parse } from "smol-toml";
import { isLogLevel, type LogLevel } from "../log.js";

export interface Config {
  db_path: string;
  port: number;
  cors_origin: string;
  token_secret: string | null;
  token_ttl_hours: number;
  email_endpoint: string | null;
  email_api_key: string | null;
  sender_address: string | null;
  push_endpoint: string | null;
  push_api_key: string | null;
  deadline_lookahead_hours: number;
  deadline_scan_interval_minutes: number;
  deadline_notify_admins: boolean;
  log_level: LogLevel;
}

export function getConfigDir(): string {
  return process.env.FIELDTASK_CONFIG_DIR ?? path.join(os.homedir(), ".fieldtask");
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.toml");
}

export function defaultConfig(): Config {
  return {
    db_path: path.join(os.homedir(), ".fieldtask", "fieldtask.db"),
    port: 3000,
    cors_origin: "*",
    token_secret: null,
    token_ttl_hours: 12,
    email_endpoint: null,
    email_api_key: null,
    sender_address: null,
    push_endpoint: null,
    push_api_key: null,
    deadline_lookahead_hours: 24,
    deadline_scan_interval_minutes: 60,
    deadline_notify_admins: false,
    log_level: "info",
  };
}

export const DEFAULT_CONFIG_TOML = `# fieldtask configuration
# Every key can also be set through the environment, e.g. FIELDTASK_PORT=8080.

# SQLite database holding tasks and users
# db_path = "~/.fieldtask/fieldtask.db"

# HTTP listen port and allowed CORS origin for the web client
port = 3000
cors_origin = "*"

# Secret used to sign bearer tokens (required by "fieldtask serve")
# token_secret = "change-me"

# How long issued tokens stay valid
token_ttl_hours = 12

# Email relay for assignment emails (disabled unless both are set)
# email_endpoint = "https://mail.example.com/send"
# sender_address = "tasks@example.com"
# email_api_key = ""

# Push topic for status changes and deadline alerts (disabled unless set)
# push_endpoint = "https://push.example.com/topics/tasks"
# push_api_key = ""

# Deadline scanner: alert tasks due within this many hours, checking this often
deadline_lookahead_hours = 24
deadline_scan_interval_minutes = 60

# Also send deadline alerts to every admin
deadline_notify_admins = false

# debug | info | warn | error
log_level = "info"
`;

type Raw = Record<string, unknown>;

function expandHome(p: string): string {
  return p.startsWith("~") ? path.join(os.homedir(), p.slice(1)) : p;
}

function readString(raw: Raw, key: string): string | null {
  const value = raw[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

function readPositiveNumber(raw: Raw, key: string): number | null {
  const value = raw[key];
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) && n > 0 ? n : null;
  }
  return null;
}

function readBoolean(raw: Raw, key: string): boolean | null {
  const value = raw[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "1" || value === "true") {
    return true;
  }
  if (value === "0" || value === "false") {
    return false;
  }
  return null;
}

function applyRaw(config: Config, raw: Raw): void {
  const dbPath = readString(raw, "db_path");
  if (dbPath) {
    config.db_path = expandHome(dbPath);
  }

  const port = readPositiveNumber(raw, "port");
  if (port !== null && Number.isInteger(port) && port < 65536) {
    config.port = port;
  }

  config.cors_origin = readString(raw, "cors_origin") ?? config.cors_origin;
  config.token_secret = readString(raw, "token_secret") ?? config.token_secret;
  config.token_ttl_hours = readPositiveNumber(raw, "token_ttl_hours") ?? config.token_ttl_hours;
  config.email_endpoint = readString(raw, "email_endpoint") ?? config.email_endpoint;
  config.email_api_key = readString(raw, "email_api_key") ?? config.email_api_key;
  config.sender_address = readString(raw, "sender_address") ?? config.sender_address;
  config.push_endpoint = readString(raw, "push_endpoint") ?? config.push_endpoint;
  config.push_api_key = readString(raw, "push_api_key") ?? config.push_api_key;
  config.deadline_lookahead_hours =
    readPositiveNumber(raw, "deadline_lookahead_hours") ?? config.deadline_lookahead_hours;
  config.deadline_scan_interval_minutes =
    readPositiveNumber(raw, "deadline_scan_interval_minutes") ??
    config.deadline_scan_interval_minutes;
  config.deadline_notify_admins =
    readBoolean(raw, "deadline_notify_admins") ?? config.deadline_notify_admins;

  const logLevel = readString(raw, "log_level")?.toLowerCase();
  if (logLevel && isLogLevel(logLevel)) {
    config.log_level = logLevel;
  }
}

const ENV_PREFIX = "FIELDTASK_";

/** Config keys taken from FIELDTASK_<UPPER_KEY> variables. */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): Raw {
  const raw: Raw = {};
  for (const key of Object.keys(defaultConfig())) {
    const value = env[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (value !== undefined) {
      raw[key] = value;
    }
  }
  return raw;
}

/**
 * Defaults, then the TOML file, then the environment. Invalid values are
 * ignored key by key; an unreadable file is reported and skipped.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const resolved = configPath ?? getConfigPath();
  const config = defaultConfig();

  if (fs.existsSync(resolved)) {
    const text = fs.readFileSync(resolved, "utf-8");
    try {
      applyRaw(config, parse(text));
    } catch (err) {
      process.stderr.write(
        `Warning: Could not parse config file at ${resolved}: ${err instanceof Error ? err.message : String(err)}. Using defaults.\n`,
      );
    }
  }

  applyRaw(config, envOverrides(env));
  return config;
}
