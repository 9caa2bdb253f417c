import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  parseSimpleYaml,
  partialConfigFromObject,
  validateConfig,
} from "../../src/config/config";

describe("configFromEnv", () => {

  it("falls back to defaults for an empty environment", () => {
    expect(configFromEnv("BAML_BRIDGE", {})).toEqual(DEFAULT_CONFIG);
  });

  it("reads every setting and ignores unknown values", () => {
    const config = configFromEnv("BAML_BRIDGE", {
      BAML_BRIDGE_PREFIX: "none",
      BAML_BRIDGE_OR_SPLITTER: " | ",
      BAML_BRIDGE_ENUM_VALUE_PREFIX: "- ",
      BAML_BRIDGE_ALWAYS_HOIST_ENUMS: "1",
      BAML_BRIDGE_MAP_STYLE: "ObjectLiteral",
      BAML_BRIDGE_HOIST_CLASSES: "sometimes",
      BAML_BRIDGE_QUOTE_CLASS_FIELDS: "false",
      BAML_BRIDGE_TAG_FIELD: "kind",
      BAML_BRIDGE_LOG_LEVEL: "debug",
    });
    expect(config).toEqual({
      render: {
        prefix: null,
        orSplitter: " | ",
        enumValuePrefix: "- ",
        alwaysHoistEnums: true,
        mapStyle: "ObjectLiteral",
        hoistClasses: "auto",
        quoteClassFields: false,
      },
      schema: { defaultTagField: "kind" },
      log: { level: "debug" },
    });
  });

  it("honors a custom prefix", () => {
    expect(configFromEnv("APP", { APP_PREFIX: "Answer with:" }).render.prefix).toBe("Answer with:");
  });
});

describe("partialConfigFromObject", () => {

  it("accepts camelCase and snake_case keys and returns only what is set", () => {
    const partial = partialConfigFromObject({
      render: { or_splitter: " / ", quoteClassFields: "true" },
      schema: { default_tag_field: "kind" },
      log: { level: "loud" },
    });
    expect(partial).toEqual({
      render: { orSplitter: " / ", quoteClassFields: true },
      schema: { defaultTagField: "kind" },
      log: {},
    });
  });

  it("fills the rest from defaults", () => {
    const config = configFromObject({ render: { prefix: null } });
    expect(config.render).toEqual(DEFAULT_CONFIG.render);
  });
});

describe("mergeConfigs", () => {

  it("lets later configs win per setting", () => {
    const merged = mergeConfigs({ render: { prefix: "A", orSplitter: "|" } }, { render: { prefix: "B" } });
    expect(merged.render.prefix).toBe("B");
    expect(merged.render.orSplitter).toBe("|");
    expect(merged.schema).toEqual(DEFAULT_CONFIG.schema);
    expect(DEFAULT_CONFIG.render.prefix).toBeNull();
  });
});

describe("parseSimpleYaml", () => {

  it("parses nested maps and scalars", () => {
    const yaml = [
      "# bridge settings",
      "render:",
      '  prefix: "Answer with:"',
      "  always_hoist_enums: true",
      "  enum_value_prefix: null",
      "schema:",
      "  default_tag_field: kind",
      "retries: 3",
      "ratio: 0.5",
    ].join("\n");
    expect(parseSimpleYaml(yaml)).toEqual({
      render: { prefix: "Answer with:", always_hoist_enums: true, enum_value_prefix: null },
      schema: { default_tag_field: "kind" },
      retries: 3,
      ratio: 0.5,
    });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "baml-bridge-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("uses the environment when no file is present", () => {
    expect(loadConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it("layers file over environment and overrides over file", () => {
    fs.writeFileSync(
      path.join(dir, "baml-bridge.config.json"),
      JSON.stringify({ schema: { default_tag_field: "variant" }, log: { level: "info" } })
    );
    const config = loadConfig({
      cwd: dir,
      env: { BAML_BRIDGE_TAG_FIELD: "kind", BAML_BRIDGE_OR_SPLITTER: " | " },
      overrides: { log: { level: "error" } },
    });
    expect(config.schema.defaultTagField).toBe("variant");
    expect(config.render.orSplitter).toBe(" | ");
    expect(config.log.level).toBe("error");
  });

  it("reads an explicit YAML file", () => {
    const file = path.join(dir, "bridge.yaml");
    fs.writeFileSync(file, "render:\n  map_style: ObjectLiteral\n");
    expect(loadConfig({ configFile: file, env: {} }).render.mapStyle).toBe("ObjectLiteral");
    expect(configFromFile(file).render.mapStyle).toBe("ObjectLiteral");
  });

  it("rejects missing files and unknown formats", () => {
    const missing = path.join(dir, "nope.json");
    expect(() => configFromFile(missing)).toThrow(`Config file not found: ${missing}`);
    const toml = path.join(dir, "bridge.toml");
    fs.writeFileSync(toml, "");
    expect(() => configFromFile(toml)).toThrow("Unsupported config file format: .toml");
  });
});

describe("validateConfig", () => {

  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("reports bad tag fields, blank splitters and blank prefixes", () => {
    const config = mergeConfigs({ schema: { defaultTagField: "my-tag" }, render: { orSplitter: "  ", prefix: " " } });
    expect(validateConfig(config)).toEqual({
      valid: false,
      errors: ['defaultTagField must be an identifier: "my-tag"', "orSplitter must contain a non-space character"],
      warnings: ["prefix is blank; use null to render no prefix"],
    });
  });
});
