import fs from "node:fs";
import path from "node:path";
import type { GatePolicy } from "../gating/types.js";
import type { GateConfig, LogLevel, LoggingConfig, TelegramConfig } from "./types.js";
import { resolveConfigPath, resolveStateDir } from "./paths.js";
import { JoinGateSchema } from "./zod-schema.js";

export type JoinGateConfig = {
  telegram?: TelegramConfig;
  gate?: GateConfig;
  logging?: LoggingConfig;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_GATE_POLICY: GatePolicy = {
  attempts: 3,
  timeoutMs: 15 * 60 * 1000,
  onWrongAnswer: "repeat",
  removal: "kick",
  removalRetries: 1,
  retryCooldownMs: 0,
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function validateConfig(raw: unknown, source = "config"): JoinGateConfig {
  const result = JoinGateSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid ${source}:\n${issues.join("\n")}`);
  }
  return result.data;
}

export function loadConfig(
  params: { env?: NodeJS.ProcessEnv; configPath?: string } = {},
): JoinGateConfig {
  const env = params.env ?? process.env;
  const configPath = params.configPath ?? resolveConfigPath(env);
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return {};
    }
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${configPath}: ${String(err)}`);
  }
  return validateConfig(parsed, configPath);
}

export function resolveGatePolicy(cfg: JoinGateConfig): GatePolicy {
  const gate = cfg.gate ?? {};
  return {
    attempts: gate.attempts ?? DEFAULT_GATE_POLICY.attempts,
    timeoutMs:
      typeof gate.timeoutSeconds === "number"
        ? gate.timeoutSeconds * 1000
        : DEFAULT_GATE_POLICY.timeoutMs,
    onWrongAnswer: gate.onWrongAnswer ?? DEFAULT_GATE_POLICY.onWrongAnswer,
    removal: gate.removal ?? DEFAULT_GATE_POLICY.removal,
    removalRetries: gate.removalRetries ?? DEFAULT_GATE_POLICY.removalRetries,
    retryCooldownMs:
      typeof gate.retryCooldownSeconds === "number"
        ? gate.retryCooldownSeconds * 1000
        : DEFAULT_GATE_POLICY.retryCooldownMs,
  };
}

export function resolveQuestionsPath(
  cfg: JoinGateConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const configured = cfg.gate?.questionsFile?.trim();
  if (configured) {
    return path.resolve(configured);
  }
  return path.join(resolveStateDir(env), "questions.json");
}

export function resolveBotToken(
  cfg: JoinGateConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const token =
    env.JOINGATE_BOT_TOKEN?.trim() || env.TELEGRAM_BOT_TOKEN?.trim() || cfg.telegram?.botToken;
  if (!token) {
    throw new ConfigError(
      "Telegram bot token missing: set JOINGATE_BOT_TOKEN or telegram.botToken",
    );
  }
  return token;
}

export function resolveLogLevel(
  cfg: JoinGateConfig,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const fromEnv = env.JOINGATE_LOG_LEVEL?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === fromEnv);
  return match ?? cfg.logging?.level ?? "info";
}
