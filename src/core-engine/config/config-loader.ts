/**
 * ConfigLoader — Loads and validates the pipeline definition file.
 *
 * Supports:
 *   - `pipewright.yml`, `pipewright.yaml` or `.pipewright/config.yml` at the workspace root
 *   - Typed parameters substituted before validation
 *   - Deep merging of `settings` over the defaults, arrays replaced
 */

import * as fs from "fs";
import * as path from "path";
import {Value} from "@sinclair/typebox/value";
import type {TSchema} from "@sinclair/typebox";
import Container, {Service} from "typedi";
import * as yaml from "yaml";
import {ConfigError, describeError} from "../../errors";
import {OutputChannelService} from "../../output-channel.service";
import {type ParameterValue, resolveParameters, substituteParameters} from "./parameters";
import {
  type ParameterDefinition,
  ParametersSchema,
  type PipelineFile,
  PipelineFileSchema,
  type PipelineSettings,
  SettingsSchema,
} from "./pipeline-schema";

// ─── Default Configuration ──────────────────────────────────

export const DEFAULT_SETTINGS: PipelineSettings = {
  maxConcurrency: 4,
  fallbackWeight: 1,
  imbalanceThreshold: 1.5,
  gracePeriodMs: 10_000,
  killGraceMs: 5_000,
  reportDir: "test-reports",
  timingsFile: ".pipewright/timings.json",
  recordTimings: true,
  events: {
    enabled: false,
    port: 0,
  },
};

export const CONFIG_FILENAMES = ["pipewright.yml", "pipewright.yaml", path.join(".pipewright", "config.yml")];

export interface LoadOptions {
  /** Explicit file; otherwise searched for in the workspace root */
  configPath?: string;
  /** Raw `--param key=value` overrides */
  parameterOverrides?: Record<string, string>;
}

export interface LoadedConfig {
  path: string;
  /** Directory relative paths in the file are resolved against */
  root: string;
  settings: PipelineSettings;
  parameters: Record<string, ParameterValue>;
  definition: PipelineFile;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = {...target};

  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = target[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      output[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      output[key] = sourceVal;
    }
  }

  return output;
}

/** Validation issues as `path: message` lines. */
function schemaIssues(schema: TSchema, value: unknown, prefix = ""): string[] {
  const issues: string[] = [];
  for (const error of Value.Errors(schema, value)) {
    issues.push(`${prefix}${error.path || "/"}: ${error.message}`);
    if (issues.length >= 20) break;
  }
  return issues;
}

// ─── ConfigLoader Class ────────────────────────────────────

@Service()
export class ConfigLoader {
  private readonly output = Container.get(OutputChannelService);
  private cache = new Map<string, LoadedConfig>();

  /**
   * Load, substitute and validate the pipeline definition.
   * @throws ConfigError when the file is missing, unparseable or invalid.
   */
  async load(workspaceRoot: string, options: LoadOptions = {}): Promise<LoadedConfig> {
    const configPath = options.configPath
      ? path.resolve(workspaceRoot, options.configPath)
      : this.findConfigFile(workspaceRoot);
    if (!configPath) {
      throw new ConfigError(`No pipeline definition found in ${workspaceRoot}`, [
        `looked for ${CONFIG_FILENAMES.join(", ")}`,
      ]);
    }

    const overrides = options.parameterOverrides ?? {};
    const cacheKey = `${configPath}\n${this.fileVersion(configPath)}\n${JSON.stringify(overrides)}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const raw = await this.readDocument(configPath);
    const loaded = this.interpret(raw, configPath, overrides);
    this.cache.set(cacheKey, loaded);
    this.output.appendLine(
      `[ConfigLoader] Loaded ${path.basename(configPath)}: ${Object.keys(loaded.definition.jobs).length} job(s)`,
    );
    return loaded;
  }

  findConfigFile(directory: string): string | null {
    for (const filename of CONFIG_FILENAMES) {
      const fullPath = path.join(directory, filename);
      if (fs.existsSync(fullPath)) {
        return fullPath;
      }
    }
    return null;
  }

  // ─── Private Helpers ──────────────────────────────────────

  /** Modification time and size; a changed file misses the cache. */
  private fileVersion(configPath: string): string {
    try {
      const stat = fs.statSync(configPath);
      return `${stat.mtimeMs}:${stat.size}`;
    } catch {
      // Missing file: readDocument reports it
      return "missing";
    }
  }

  private async readDocument(configPath: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.promises.readFile(configPath, "utf-8");
    } catch (error) {
      throw new ConfigError(`Cannot read ${configPath}: ${describeError(error)}`);
    }

    const document = yaml.parseDocument(content, {prettyErrors: true});
    if (document.errors.length > 0) {
      throw new ConfigError(`Cannot parse ${configPath}`, document.errors.map((e) => e.message));
    }
    return document.toJS();
  }

  private interpret(raw: unknown, configPath: string, overrides: Record<string, string>): LoadedConfig {
    if (!isPlainObject(raw)) {
      throw new ConfigError(`${configPath} must contain a mapping at the top level`);
    }

    const declared = raw.parameters ?? {};
    if (!Value.Check(ParametersSchema, declared)) {
      throw new ConfigError(`Invalid parameters in ${configPath}`, schemaIssues(ParametersSchema, declared, "/parameters"));
    }
    const definitions: Record<string, ParameterDefinition> = declared;
    const parameters = resolveParameters(definitions, overrides);

    const rest = Object.fromEntries(Object.entries(raw).filter(([key]) => key !== "parameters"));
    const substituted = substituteParameters(rest, parameters);
    const candidate = isPlainObject(substituted) ? {...substituted, parameters: declared} : substituted;

    if (!Value.Check(PipelineFileSchema, candidate)) {
      throw new ConfigError(`Invalid pipeline definition in ${configPath}`, schemaIssues(PipelineFileSchema, candidate));
    }

    const userSettings = candidate.settings ?? {};
    if (!isPlainObject(userSettings)) {
      throw new ConfigError(`Invalid settings in ${configPath}`, ["/settings: expected a mapping"]);
    }
    const merged = deepMerge({...DEFAULT_SETTINGS}, userSettings);
    if (!Value.Check(SettingsSchema, merged)) {
      throw new ConfigError(`Invalid settings in ${configPath}`, schemaIssues(SettingsSchema, merged, "/settings"));
    }

    const directory = path.dirname(configPath);
    return {
      path: configPath,
      root: path.basename(directory) === ".pipewright" ? path.dirname(directory) : directory,
      settings: merged,
      parameters,
      definition: candidate,
    };
  }
}
