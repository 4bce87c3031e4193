#!/usr/bin/env node
import { Command } from "commander";
import { Bot } from "grammy";
import path from "node:path";
import {
  loadConfig,
  resolveBotToken,
  resolveGatePolicy,
  resolveLogLevel,
  resolveQuestionsPath,
} from "../config/config.js";
import { createQuestionBank, loadQuestionsFile } from "../gating/questions.js";
import { createGateService } from "../gating/service.js";
import { createFileGateRecordStore } from "../gating/store.js";
import { createTelegramGateTransport } from "../gating/telegram.js";
import { describeError } from "../gating/errors.js";
import { createSubsystemLogger, setLogLevel } from "../logging.js";
import { createGateUpdateHandlers, registerGateHandlers } from "../telegram/handlers.js";
import { VERSION } from "../version.js";

const program = new Command();

program
  .name("joingate")
  .version(VERSION)
  .option("--config <path>", "Path to the JSON config file")
  .option("--questions <path>", "Path to the question bank JSON file")
  .parse(process.argv);

const opts = program.opts<{ config?: string; questions?: string }>();

const cfg = loadConfig({ configPath: opts.config ? path.resolve(opts.config) : undefined });
setLogLevel(resolveLogLevel(cfg));
const log = createSubsystemLogger("joingate");

const questionsPath = opts.questions ? path.resolve(opts.questions) : resolveQuestionsPath(cfg);
const bank = createQuestionBank(await loadQuestionsFile(questionsPath));
const policy = resolveGatePolicy(cfg);

const bot = new Bot(resolveBotToken(cfg));
await bot.init();

const transport = createTelegramGateTransport({
  api: bot.api,
  removal: policy.removal,
  botUsername: bot.botInfo.username,
});
const store = cfg.gate?.persist === false ? undefined : createFileGateRecordStore();
const service = createGateService({ policy, bank, transport, store });
const restored = await service.restore();

registerGateHandlers(
  bot,
  createGateUpdateHandlers({
    service,
    transport,
    gate: cfg.gate,
    botUsername: bot.botInfo.username,
  }),
);

async function reloadQuestions(): Promise<void> {
  try {
    bank.reload(await loadQuestionsFile(questionsPath));
    log.info("question bank reloaded", { questions: bank.size() });
  } catch (err) {
    log.error("question bank reload failed, keeping the current one", {
      error: describeError(err),
    });
  }
}

async function stop(signal: string): Promise<void> {
  log.info("stopping", { signal });
  await bot.stop();
  await service.shutdown();
}

process.on("SIGHUP", () => {
  void reloadQuestions();
});
process.once("SIGINT", () => {
  void stop("SIGINT");
});
process.once("SIGTERM", () => {
  void stop("SIGTERM");
});

log.info("starting", {
  version: VERSION,
  bot: bot.botInfo.username,
  questions: bank.size(),
  restored,
  attempts: policy.attempts,
  timeoutSeconds: policy.timeoutMs / 1000,
});
await bot.start({ allowed_updates: ["message"] });
