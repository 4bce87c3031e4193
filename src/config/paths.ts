import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "JOINGATE_STATE_DIR";
export const CONFIG_PATH_ENV = "JOINGATE_CONFIG_PATH";

function resolveUserPath(input: string, homedir: () => string): string {
  const trimmed = input.trim();
  if (trimmed === "~") {
    return homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(homedir(), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) {
    return resolveUserPath(override, homedir);
  }
  return path.join(homedir(), ".joingate");
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) {
    return resolveUserPath(override, homedir);
  }
  return path.join(resolveStateDir(env, homedir), "joingate.json");
}
