import { isAbsolute, join } from "node:path";
import type { Config } from "./types";

export const DEFAULT_TASKFILE = "Taskfile";

export type Environment = Record<string, string | undefined>;

export type MakeshiftConfig = Config & {
  /** Absolute path of the Taskfile to load */
  taskfile: string;
};

const FALSE_VALUES = new Set(["0", "false", "no", "off"]);
const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

/**
 * Read settings from the environment.
 *
 * - `MAKESHIFT_FILE` Taskfile location, relative to `cwd` unless absolute
 * - `MAKESHIFT_QUIET` hides progress messages and step echo
 * - `MAKESHIFT_PREFIX` `false` drops task prefixes, any other value replaces them
 */
export function loadConfig(
  env: Environment = process.env,
  cwd: string = process.cwd()
): MakeshiftConfig {
  const file = env["MAKESHIFT_FILE"]?.trim() || DEFAULT_TASKFILE;
  const config: MakeshiftConfig = {
    quiet: TRUE_VALUES.has(env["MAKESHIFT_QUIET"]?.trim().toLowerCase() ?? ""),
    taskfile: isAbsolute(file) ? file : join(cwd, file),
  };

  const prefix = env["MAKESHIFT_PREFIX"];
  if (prefix !== undefined && prefix !== "") {
    config.prefix = FALSE_VALUES.has(prefix.trim().toLowerCase()) ? false : prefix;
  }

  return config;
}
