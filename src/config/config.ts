// src/config/config.ts
// Configuration for baml-bridge: schema rendering options, builder defaults, logging

import * as fs from "fs";
import * as path from "path";
import { isLogLevel, type LogLevel } from "../log/logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type MapStyle = "TypeParameters" | "ObjectLiteral";

export type HoistClasses = "auto" | "all" | "none";

/** Options that change how a schema is shown to a model. */
export type RenderOptions = {
  /** Text placed before the schema, null for none */
  prefix: string | null;
  /** Separator between union members */
  orSplitter: string;
  /** Prefix before each enum value, null for none */
  enumValuePrefix: string | null;
  /** Always render enums as named, hoisted definitions */
  alwaysHoistEnums: boolean;
  /** How maps are written */
  mapStyle: MapStyle;
  /** Which classes are hoisted into named definitions */
  hoistClasses: HoistClasses;
  /** Quote class field names */
  quoteClassFields: boolean;
};

export type SchemaConfig = {
  /** Tag field name for data enums without an explicit `tag` */
  defaultTagField: string;
};

export type LogConfig = {
  level: LogLevel;
};

export type BamlBridgeConfig = {
  render: RenderOptions;
  schema: SchemaConfig;
  log: LogConfig;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  prefix: null,
  orSplitter: " or ",
  enumValuePrefix: null,
  alwaysHoistEnums: false,
  mapStyle: "TypeParameters",
  hoistClasses: "auto",
  quoteClassFields: false,
};

export const DEFAULT_SCHEMA_CONFIG: SchemaConfig = {
  defaultTagField: "type",
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_CONFIG: BamlBridgeConfig = {
  render: DEFAULT_RENDER_OPTIONS,
  schema: DEFAULT_SCHEMA_CONFIG,
  log: DEFAULT_LOG_CONFIG,
};

// =========================================================================
// Value readers
// =========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function readBool(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  return undefined;
}

function readNullableString(value: unknown): string | null | undefined {
  if (value === null || value === "none") return null;
  return readString(value);
}

function readMapStyle(value: unknown): MapStyle | undefined {
  return value === "TypeParameters" || value === "ObjectLiteral" ? value : undefined;
}

function readHoist(value: unknown): HoistClasses | undefined {
  return value === "auto" || value === "all" || value === "none" ? value : undefined;
}

function readLogLevel(value: unknown): LogLevel | undefined {
  return typeof value === "string" && isLogLevel(value) ? value : undefined;
}

/** First key present in `data`, accepting camelCase or snake_case. */
function pick(data: Record<string, unknown>, camel: string, snake: string): unknown {
  return camel in data ? data[camel] : data[snake];
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "BAML_BRIDGE", env: NodeJS.ProcessEnv = process.env): BamlBridgeConfig {
  const prefixEnv = env[`${prefix}_PREFIX`];
  return {
    render: {
      prefix: prefixEnv === undefined ? DEFAULT_RENDER_OPTIONS.prefix : readNullableString(prefixEnv) ?? null,
      orSplitter: env[`${prefix}_OR_SPLITTER`] || DEFAULT_RENDER_OPTIONS.orSplitter,
      enumValuePrefix: readNullableString(env[`${prefix}_ENUM_VALUE_PREFIX`]) ?? DEFAULT_RENDER_OPTIONS.enumValuePrefix,
      alwaysHoistEnums: readBool(env[`${prefix}_ALWAYS_HOIST_ENUMS`]) ?? DEFAULT_RENDER_OPTIONS.alwaysHoistEnums,
      mapStyle: readMapStyle(env[`${prefix}_MAP_STYLE`]) ?? DEFAULT_RENDER_OPTIONS.mapStyle,
      hoistClasses: readHoist(env[`${prefix}_HOIST_CLASSES`]) ?? DEFAULT_RENDER_OPTIONS.hoistClasses,
      quoteClassFields: readBool(env[`${prefix}_QUOTE_CLASS_FIELDS`]) ?? DEFAULT_RENDER_OPTIONS.quoteClassFields,
    },
    schema: {
      defaultTagField: env[`${prefix}_TAG_FIELD`] || DEFAULT_SCHEMA_CONFIG.defaultTagField,
    },
    log: {
      level: readLogLevel(env[`${prefix}_LOG_LEVEL`]) ?? DEFAULT_LOG_CONFIG.level,
    },
  };
}

/**
 * Read a JSON or YAML config file. Only the settings it names are returned.
 */
export function partialConfigFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return partialConfigFromObject(data);
}

/**
 * Load configuration from a JSON or YAML file over the defaults.
 */
export function configFromFile(filePath: string): BamlBridgeConfig {
  return mergeConfigs(partialConfigFromFile(filePath));
}

/**
 * Read the settings present in a plain object (e.g., from parsed JSON/YAML).
 * Keys may be camelCase or snake_case.
 */
export function partialConfigFromObject(data: Record<string, unknown>): PartialConfig {
  const renderData: Record<string, unknown> = isRecord(data.render) ? data.render : {};
  const schemaData: Record<string, unknown> = isRecord(data.schema) ? data.schema : {};
  const logData: Record<string, unknown> = isRecord(data.log) ? data.log : {};

  const render: Partial<RenderOptions> = {};
  const prefix = pick(renderData, "prefix", "prefix");
  if (prefix !== undefined) render.prefix = readNullableString(prefix) ?? null;
  const orSplitter = readString(pick(renderData, "orSplitter", "or_splitter"));
  if (orSplitter !== undefined) render.orSplitter = orSplitter;
  const enumValuePrefix = pick(renderData, "enumValuePrefix", "enum_value_prefix");
  if (enumValuePrefix !== undefined) render.enumValuePrefix = readNullableString(enumValuePrefix) ?? null;
  const alwaysHoistEnums = readBool(pick(renderData, "alwaysHoistEnums", "always_hoist_enums"));
  if (alwaysHoistEnums !== undefined) render.alwaysHoistEnums = alwaysHoistEnums;
  const mapStyle = readMapStyle(pick(renderData, "mapStyle", "map_style"));
  if (mapStyle !== undefined) render.mapStyle = mapStyle;
  const hoistClasses = readHoist(pick(renderData, "hoistClasses", "hoist_classes"));
  if (hoistClasses !== undefined) render.hoistClasses = hoistClasses;
  const quoteClassFields = readBool(pick(renderData, "quoteClassFields", "quote_class_fields"));
  if (quoteClassFields !== undefined) render.quoteClassFields = quoteClassFields;

  const schema: Partial<SchemaConfig> = {};
  const defaultTagField = readString(pick(schemaData, "defaultTagField", "default_tag_field"));
  if (defaultTagField !== undefined) schema.defaultTagField = defaultTagField;

  const log: Partial<LogConfig> = {};
  const level = readLogLevel(logData.level);
  if (level !== undefined) log.level = level;

  return { render, schema, log };
}

/**
 * Create configuration from a plain object over the defaults.
 */
export function configFromObject(data: Record<string, unknown>): BamlBridgeConfig {
  return mergeConfigs(partialConfigFromObject(data));
}

export type PartialConfig = {
  render?: Partial<RenderOptions>;
  schema?: Partial<SchemaConfig>;
  log?: Partial<LogConfig>;
};

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): BamlBridgeConfig {
  const result: BamlBridgeConfig = { ...DEFAULT_CONFIG };

  for (const cfg of configs) {
    if (cfg.render) {
      result.render = { ...result.render, ...cfg.render };
    }
    if (cfg.schema) {
      result.schema = { ...result.schema, ...cfg.schema };
    }
    if (cfg.log) {
      result.log = { ...result.log, ...cfg.log };
    }
  }

  return result;
}

export const DEFAULT_CONFIG_FILES = [
  "baml-bridge.config.json",
  "baml-bridge.config.yaml",
  "baml-bridge.config.yml",
];

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PartialConfig;
}): BamlBridgeConfig {
  let config = configFromEnv("BAML_BRIDGE", options?.env);

  if (options?.configFile) {
    config = mergeConfigs(config, partialConfigFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, partialConfigFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    if (indent < 0) continue;

    // Pop to the parent at a shallower indent
    let top = stack[stack.length - 1];
    while (stack.length > 1 && top !== undefined && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    if (top === undefined) continue;
    const parent = top.obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function validateConfig(config: BamlBridgeConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!IDENTIFIER.test(config.schema.defaultTagField)) {
    errors.push(`defaultTagField must be an identifier: ${JSON.stringify(config.schema.defaultTagField)}`);
  }
  if (config.render.orSplitter.trim() === "") {
    errors.push("orSplitter must contain a non-space character");
  }
  if (config.render.prefix !== null && config.render.prefix.trim() === "") {
    warnings.push("prefix is blank; use null to render no prefix");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

export class InvalidConfigError extends Error {
  constructor(readonly errors: readonly string[]) {
    super(`invalid configuration: ${errors.join("; ")}`);
    this.name = "InvalidConfigError";
  }
}
