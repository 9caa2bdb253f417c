import {
  DEFAULT_CONFIG,
  InvalidConfigError,
  loadConfig,
  validateConfig,
  type BamlBridgeConfig,
  type PartialConfig,
} from "./config/config";
import { createLogger, type Logger } from "./log/logger";
import { done, fail } from "./outcome/constructors";
import { flatMapOutcome } from "./outcome/matchers";
import type { Outcome } from "./outcome/outcome";
import { SchemaCache } from "./schema/cache";
import { SchemaBuildError } from "./schema/errors";
import type { SchemaBundle } from "./schema/builder";
import { schemaFingerprint, type SchemaFingerprint } from "./schema/fingerprint";
import type { Shape } from "./schema/shape";
import { NunjucksEvaluator, type ConstraintEvaluator } from "./convert/constraints";
import { fromBamlValue } from "./convert/from-value";
import { parseOutcome, parseValue, type Parsed } from "./convert/parse";
import { toBamlValue } from "./convert/to-value";
import { PromptValue } from "./resolve/prompt-value";
import type { BamlValue } from "./value/value";

export interface BridgeOptions {
  config?: BamlBridgeConfig;
  logger?: Logger;
  evaluator?: ConstraintEvaluator;
}

/**
 * One configured entry point: a schema cache, a logger and a constraint
 * evaluator shared by every call. Throws `InvalidConfigError` when the
 * config does not validate; warnings go to the logger.
 */
export class Bridge {
  readonly config: BamlBridgeConfig;
  readonly log: Logger;
  private readonly cache: SchemaCache;
  private readonly evaluator: ConstraintEvaluator;

  constructor(options: BridgeOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.log = options.logger ?? createLogger(this.config.log.level, console, "baml-bridge");
    const validation = validateConfig(this.config);
    if (!validation.valid) throw new InvalidConfigError(validation.errors);
    for (const warning of validation.warnings) this.log.warn(warning);
    this.evaluator = options.evaluator ?? new NunjucksEvaluator();
    this.cache = new SchemaCache({ logger: this.log, defaultTagField: this.config.schema.defaultTagField });
  }

  schema(shape: Shape): SchemaBundle {
    return this.cache.get(shape);
  }

  /** `schema` with a build error returned as a failed outcome. */
  schemaOutcome(shape: Shape): Outcome<SchemaBundle> {
    try {
      return done(this.schema(shape));
    } catch (e) {
      if (e instanceof SchemaBuildError) return fail(e.toFailure(), { path: e.trail });
      throw e;
    }
  }

  fingerprint(shape: Shape): SchemaFingerprint {
    return schemaFingerprint(this.schema(shape).outputFormat, this.config.render);
  }

  toValue<T>(shape: Shape<T>, value: T): BamlValue {
    return toBamlValue(shape, value, { bundle: this.schema(shape) });
  }

  fromValue<T>(shape: Shape<T>, value: BamlValue): T {
    return fromBamlValue(shape, value, { bundle: this.schema(shape) });
  }

  parse<T>(shape: Shape<T>, input: BamlValue): Parsed<T> {
    return parseValue(this.schema(shape), shape, input, { evaluator: this.evaluator, logger: this.log });
  }

  parseOutcome<T>(shape: Shape<T>, input: BamlValue): Outcome<Parsed<T>> {
    return flatMapOutcome(this.schemaOutcome(shape), bundle =>
      parseOutcome(bundle, shape, input, { evaluator: this.evaluator, logger: this.log })
    );
  }

  promptValue<T>(shape: Shape<T>, value: T): PromptValue {
    const bundle = this.schema(shape);
    return new PromptValue(toBamlValue(shape, value, { bundle }), bundle.target, bundle.outputFormat);
  }
}

export function createBridge(options: BridgeOptions = {}): Bridge {
  return new Bridge(options);
}

export interface LoadBridgeOptions extends Omit<BridgeOptions, "config"> {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PartialConfig;
}

/** A bridge over `loadConfig`: overrides, then the config file, then the environment. */
export function loadBridge(options: LoadBridgeOptions = {}): Bridge {
  const { configFile, cwd, env, overrides, ...rest } = options;
  return new Bridge({ ...rest, config: loadConfig({ configFile, cwd, env, overrides }) });
}
