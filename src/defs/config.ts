import { TOML } from "../deps.ts";

export interface ControllerConfig {
  interval_seconds?: number;
  debounce_seconds?: number;
  enable_watching?: boolean;

  source: Array<SourceConfig>;
}

export type SourceConfig =
| DockerEngineSourceConfig
;

export interface DockerEngineSourceConfig {
  type: 'docker-engine';
  /** Unix socket of the engine. Without it, DOCKER_HOST and friends are honored. */
  socket_path?: string;
  /** "auto" asks the engine whether this node manages a swarm */
  swarm_mode?: boolean | 'auto';
  /** Only containers carrying all of these labels are considered */
  label_filter?: Record<string, string>;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value == 'object' && value != null && !Array.isArray(value);
}

function isOptional(value: unknown, type: 'number' | 'boolean' | 'string') {
  return value === undefined || typeof value == type;
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(x => typeof x == 'string');
}

export function isSourceConfig(value: unknown): value is SourceConfig {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case 'docker-engine':
      return isOptional(value.socket_path, 'string')
        && (isOptional(value.swarm_mode, 'boolean') || value.swarm_mode === 'auto')
        && (value.label_filter === undefined || isStringMap(value.label_filter));
    default:
      return false;
  }
}

export function isControllerConfig(value: unknown): value is ControllerConfig {
  if (!isRecord(value)) return false;
  return isOptional(value.interval_seconds, 'number')
    && isOptional(value.debounce_seconds, 'number')
    && isOptional(value.enable_watching, 'boolean')
    && Array.isArray(value.source)
    && value.source.every(isSourceConfig);
}

export function parseControllerConfig(text: string): ControllerConfig {
  let parsed: unknown;
  try {
    parsed = TOML.parse(text);
  } catch (err) {
    throw new ConfigError(`config.toml is not valid TOML: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isControllerConfig(parsed)) throw new ConfigError(`config.toml was invalid`);
  // TOML tables come back without a prototype
  return structuredClone(parsed);
}
