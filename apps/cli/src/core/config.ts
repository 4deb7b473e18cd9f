import { existsSync, readFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { parse as parseYAML, YAMLParseError } from "yaml";
import { z } from "zod";
import type { ConnectionConfig, ResolvedConfig } from "@myjob/shared";
import {
  CONFIG_FILE_NAMES,
  GLOBAL_SECRET_FILE,
  SECRET_FILE_NAME,
} from "@/lib/constants.ts";
import { ConfigError } from "@/lib/errors.ts";

export type ConfigTree = Record<string, unknown>;

const MEMORY_PATTERN = /^(\d+)([GMK]?)$/;
// minutes | MM:SS | HH:MM:SS | D-HH | D-HH:MM | D-HH:MM:SS
const TIME_PATTERN = /^(\d+-\d{1,2}(:\d{2}){0,2}|\d+(:\d{2}){0,2})$/;
const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Memory in Slurm's canonical megabyte form: "4G" -> "4096M". */
export function normalizeMemory(spec: string): string {
  const match = spec.match(MEMORY_PATTERN);
  if (!match) throw new ConfigError(`Invalid memory spec: "${spec}"`);
  const amount = Number(match[1]);
  switch (match[2]) {
    case "G":
      return `${amount * 1024}M`;
    case "K":
      return `${Math.ceil(amount / 1024)}M`;
    default:
      return `${amount}M`;
  }
}

const nonEmpty = z.string().trim().min(1);

export const ConnectionSchema = z.object({
  host: nonEmpty,
  port: z.coerce.number().int().min(1).max(65535).default(22),
  user: nonEmpty.optional(),
  key_file: nonEmpty.optional(),
});

const SlurmSchema = z.object({
  partition: nonEmpty.optional(),
  account: nonEmpty.optional(),
  qos: nonEmpty.optional(),
  constraint: nonEmpty.optional(),
  array: z.coerce.string().min(1).optional(),
  dependency: nonEmpty.optional(),
  extra_options: z
    .array(z.string().refine((s) => s.trim().length > 0, "must not be empty"))
    .default([]),
});

const ResourcesSchema = z.object({
  nodes: z.number().int().min(1).default(1),
  cpus_per_task: z.number().int().min(1).default(1),
  memory: z.coerce
    .string()
    .regex(MEMORY_PATTERN, 'must look like "<digits>[G|M|K]", e.g. "16G"')
    .transform(normalizeMemory)
    .default("4G"),
  gpus: z.number().int().min(0).default(0),
  gpu_type: nonEmpty.optional(),
  time: z.coerce
    .string()
    .regex(
      TIME_PATTERN,
      'must be a Slurm time such as "1:00:00" or "2-00:00:00"',
    )
    .default("1:00:00"),
});

const GitSchema = z.object({
  repo_url: nonEmpty.optional(),
  branch: nonEmpty.optional(),
  commit: z
    .string()
    .regex(/^[0-9a-fA-F]{4,40}$/, "must be a commit hash")
    .optional(),
});

const ExecutionSchema = z
  .object({
    command: nonEmpty.optional(),
    script: nonEmpty.optional(),
    working_dir: nonEmpty.optional(),
    env_vars: z
      .record(
        z
          .string()
          .regex(ENV_KEY_PATTERN, "must be a valid shell variable name"),
        z.coerce.string(),
      )
      .default({}),
    modules: z.array(nonEmpty).default([]),
    setup: nonEmpty.optional(),
    teardown: nonEmpty.optional(),
  })
  .superRefine((execution, ctx) => {
    if (execution.command === undefined && execution.script === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "one of command or script is required",
      });
    }
    if (execution.command !== undefined && execution.script !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "command and script are mutually exclusive",
      });
    }
  });

const OutputSchema = z.object({
  stdout: nonEmpty.default("logs/stdout_%j.log"),
  stderr: nonEmpty.default("logs/stderr_%j.log"),
  fetch: z.array(nonEmpty).default([]),
  cleanup: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  name: z
    .string()
    .regex(
      /^[A-Za-z0-9_.-]+$/,
      "may only contain letters, digits, '.', '_' and '-'",
    )
    .default("myjob"),
  tags: z.array(nonEmpty).default([]),
  connection: ConnectionSchema,
  slurm: SlurmSchema.default({}),
  resources: ResourcesSchema.default({}),
  git: GitSchema.default({}),
  execution: ExecutionSchema.default({}),
  output: OutputSchema.default({}),
});

// --------------- Merging ---------------

export function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep structural merge. Mappings merge key by key; scalars and sequences
 * from `override` replace those in `base`. An override of `null` removes
 * the key; `undefined` leaves it alone.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    if (value === null) {
      delete result[key];
      continue;
    }
    const current = result[key];
    result[key] =
      isPlainObject(current) && isPlainObject(value)
        ? deepMerge(current, value)
        : value;
  }
  return result;
}

export function mergeLayers(layers: ConfigTree[]): ConfigTree {
  return layers.reduce<ConfigTree>(
    (merged, layer) => deepMerge(merged, layer),
    {},
  );
}

// --------------- Loading ---------------

function readYamlFile(path: string): ConfigTree {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let data: unknown;
  try {
    data = parseYAML(raw);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      const where = pos ? `${path}:${pos.line}:${pos.col}` : path;
      const summary = error.message.split("\n")[0] ?? error.message;
      throw new ConfigError(`${where}: ${summary}`);
    }
    throw error;
  }

  if (data === null || data === undefined) return {};
  if (!isPlainObject(data)) {
    throw new ConfigError(`${path}: top level must be a mapping`);
  }
  return data;
}

export interface ResolveOptions {
  /** Explicit project config; must exist when given. */
  configPath?: string;
  /** Highest-precedence layer, typically built from CLI flags. */
  overrides?: ConfigTree;
  cwd?: string;
  globalSecretPath?: string;
}

export interface ConfigLayer {
  source: string;
  data: ConfigTree;
}

/** The explicit path if given, else myjob.yaml or myjob.yml in cwd. */
export function findProjectConfig(
  options: ResolveOptions = {},
): string | null {
  const cwd = options.cwd ?? process.cwd();
  if (options.configPath) {
    const explicit = resolve(cwd, options.configPath);
    if (!existsSync(explicit)) {
      throw new ConfigError(`Config file not found: ${explicit}`);
    }
    return explicit;
  }
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/** Lowest precedence first. Missing files are skipped. */
export function loadConfigLayers(options: ResolveOptions = {}): ConfigLayer[] {
  const cwd = options.cwd ?? process.cwd();
  const projectConfig = findProjectConfig(options);
  const projectDir = projectConfig ? dirname(projectConfig) : cwd;
  const globalSecret = options.globalSecretPath ?? GLOBAL_SECRET_FILE;
  const projectSecret = join(projectDir, SECRET_FILE_NAME);

  const layers: ConfigLayer[] = [];
  if (existsSync(globalSecret)) {
    layers.push({ source: globalSecret, data: readYamlFile(globalSecret) });
  }
  if (projectSecret !== globalSecret && existsSync(projectSecret)) {
    layers.push({ source: projectSecret, data: readYamlFile(projectSecret) });
  }
  if (projectConfig) {
    layers.push({ source: projectConfig, data: readYamlFile(projectConfig) });
  }
  if (options.overrides) {
    layers.push({ source: "command line", data: options.overrides });
  }
  return layers;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

function validate<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  layers: ConfigLayer[],
): z.output<T> {
  const parsed = schema.safeParse(data);
  if (parsed.success) return parsed.data;

  const sources = layers.map((l) => l.source).join(", ") || "no config files";
  const hint = layers.some((l) => l.source !== "command line")
    ? ""
    : '\nNo myjob.yaml found. Run "myjob init" to create one.';
  throw new ConfigError(
    `Invalid configuration (from ${sources}):\n${formatIssues(parsed.error)}${hint}`,
  );
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Merge global secrets, project secrets, the project config and overrides
 * (lowest to highest precedence) and validate the result as a whole.
 */
export function resolveConfig(options: ResolveOptions = {}): ResolvedConfig {
  const layers = loadConfigLayers(options);
  const merged = mergeLayers(layers.map((l) => l.data));
  const config: ResolvedConfig = validate(ConfigSchema, merged, layers);
  return deepFreeze(config);
}

/** Only the connection section; enough for read-only cluster queries. */
export function resolveConnection(
  options: ResolveOptions = {},
): ConnectionConfig {
  const layers = loadConfigLayers(options);
  const merged = mergeLayers(layers.map((l) => l.data));
  const section = validate(
    z.object({ connection: ConnectionSchema }),
    merged,
    layers,
  );
  return section.connection;
}

// --------------- CLI overrides ---------------

export interface OverrideFlags {
  host?: string;
  user?: string;
  name?: string;
  partition?: string;
  account?: string;
  qos?: string;
  time?: string;
  memory?: string;
  nodes?: string;
  cpus?: string;
  gpus?: string;
  gpuType?: string;
  command?: string;
  script?: string;
  branch?: string;
  commit?: string;
}

function toInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`--${flag} must be an integer, got "${value}"`);
  }
  return n;
}

/**
 * Build the override layer from CLI flags. Setting --command clears a
 * configured script and vice versa.
 */
export function configOverridesFromFlags(flags: OverrideFlags): ConfigTree {
  const overrides: ConfigTree = {
    name: flags.name,
    connection: {
      host: flags.host,
      user: flags.user,
    },
    slurm: {
      partition: flags.partition,
      account: flags.account,
      qos: flags.qos,
    },
    resources: {
      time: flags.time,
      memory: flags.memory,
      nodes: toInt("nodes", flags.nodes),
      cpus_per_task: toInt("cpus", flags.cpus),
      gpus: toInt("gpus", flags.gpus),
      gpu_type: flags.gpuType,
    },
    git: {
      branch: flags.branch,
      commit: flags.commit,
    },
    execution: {
      command: flags.command ?? (flags.script !== undefined ? null : undefined),
      script: flags.script ?? (flags.command !== undefined ? null : undefined),
    },
  };
  return overrides;
}
