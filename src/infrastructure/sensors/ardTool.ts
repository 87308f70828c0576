import path from "path";
import { ConfigurationError } from "../../core/errors";
import type { ToolInvocation } from "../../ports/SensorPlugin";

export type ArdToolOptions = {
  program: string;
  /** May reference `{input}`, `{output}` and `{inputName}`. */
  args: string[];
  timeoutMs: number;
  /** Artifact path relative to the output directory; same placeholders as `args`. */
  artifact: string;
  env?: Record<string, string>;
};

export const defaultArdArgs: readonly string[] = ["--input", "{input}", "--output", "{output}"];
export const DEFAULT_ARD_TIMEOUT_MS = 2 * 60 * 60_000;
const DEFAULT_ARTIFACT = "{inputName}_ard.tif";

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const parseEnv = (value: unknown, sensor: string): Record<string, string> | undefined => {
  if (value == null) return undefined;
  if (!isRecord(value)) throw new ConfigurationError(`${sensor}: ard.env must be an object of strings`);
  const env: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") throw new ConfigurationError(`${sensor}: ard.env.${key} must be a string`);
    env[key] = entry;
  }
  return env;
};

export const parseArdToolOptions = (raw: unknown, sensor: string): ArdToolOptions => {
  if (!isRecord(raw)) throw new ConfigurationError(`${sensor}: ard options are required`);

  const program = typeof raw.program === "string" ? raw.program.trim() : "";
  if (program === "") throw new ConfigurationError(`${sensor}: ard.program is required`);

  const rawArgs = raw.args;
  if (rawArgs != null && !isStringArray(rawArgs)) {
    throw new ConfigurationError(`${sensor}: ard.args must be an array of strings`);
  }
  const args = rawArgs ?? [...defaultArdArgs];

  const timeoutMs = raw.timeoutMs ?? DEFAULT_ARD_TIMEOUT_MS;
  if (typeof timeoutMs !== "number" || !Number.isInteger(timeoutMs) || timeoutMs < 1000) {
    throw new ConfigurationError(`${sensor}: ard.timeoutMs must be an integer >= 1000`);
  }

  const artifact = raw.artifact ?? DEFAULT_ARTIFACT;
  if (typeof artifact !== "string" || artifact.trim() === "" || path.isAbsolute(artifact)) {
    throw new ConfigurationError(`${sensor}: ard.artifact must be a relative path`);
  }

  return { program, args, timeoutMs, artifact, env: parseEnv(raw.env, sensor) };
};

const fillPlaceholders = (template: string, values: Record<"input" | "output" | "inputName", string>): string =>
  template.replace(/\{(input|output|inputName)\}/g, (_match, key: "input" | "output" | "inputName") => values[key]);

export const buildToolInvocation = (options: ArdToolOptions, localPath: string, outputDir: string): ToolInvocation => {
  const values = {
    input: localPath,
    output: outputDir,
    inputName: path.parse(localPath).name
  };
  return {
    program: options.program,
    args: options.args.map((arg) => fillPlaceholders(arg, values)),
    timeoutMs: options.timeoutMs,
    expectedArtifact: path.join(outputDir, fillPlaceholders(options.artifact, values)),
    cwd: outputDir,
    env: options.env
  };
};
