import { Command } from "commander";
import path from "node:path";
import { loadConfig, resolveQuestionsPath } from "../config/config.js";
import { describeError } from "../gating/errors.js";
import { loadQuestionsFile } from "../gating/questions.js";

const program = new Command();

program
  .argument("[file]", "Question bank JSON file (defaults to the configured one)")
  .option("--config <path>", "Path to the JSON config file")
  .parse(process.argv);

const opts = program.opts<{ config?: string }>();
const [fileArg] = program.args;

try {
  const filePath = fileArg
    ? path.resolve(fileArg)
    : resolveQuestionsPath(
        loadConfig({ configPath: opts.config ? path.resolve(opts.config) : undefined }),
      );
  const questions = await loadQuestionsFile(filePath);
  console.log(`questions ok: ${questions.length}`);
} catch (err) {
  console.error(describeError(err));
  process.exitCode = 1;
}
