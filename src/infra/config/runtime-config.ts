import * as fs from 'fs';
import * as path from 'path';
import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import { getConfigDir } from './config-paths.js';
import type { SafetyMode } from '../llm/llm-provider.js';
import { GEMINI_BASE_URL } from '../llm/gemini-provider.js';
import { OPENAI_BASE_URL } from '../llm/providers.js';

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export interface CompletionEndpointConfig {
  model: string;
  baseUrl: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

export interface ChatRelayRuntimeConfig {
  $schema?: string;
  /** Primary completion API (Google AI Studio), used for the probe and chat turns */
  primary: CompletionEndpointConfig & {
    /** Safety filters for chat turns. The credential probe is always relaxed. */
    chatSafety: SafetyMode;
  };
  /** Secondary completion API (OpenAI), used only for the end-of-session summary */
  secondary: CompletionEndpointConfig;
  credentials: {
    primaryKeyPrefix: string;
    secondaryKeyPrefix: string;
    probePrompt: string;
    probeTimeoutMs: number;
    /** Output token cap for the probe call */
    probeMaxTokens: number;
  };
  debug: {
    loggingEnabled: boolean;
  };
}

/**
 * Shape of chatrelay.json: every field optional, merged over the defaults.
 */
export interface RuntimeConfigFile {
  $schema?: string;
  primary?: Partial<ChatRelayRuntimeConfig['primary']>;
  secondary?: Partial<ChatRelayRuntimeConfig['secondary']>;
  credentials?: Partial<ChatRelayRuntimeConfig['credentials']>;
  debug?: Partial<ChatRelayRuntimeConfig['debug']>;
}

export const DEFAULT_RUNTIME_CONFIG: ChatRelayRuntimeConfig = {
  $schema: './chatrelay.schema.json',
  primary: {
    model: 'gemini-2.0-flash',
    baseUrl: GEMINI_BASE_URL,
    timeoutMs: 60000,
    maxTokens: 4000,
    temperature: 0.7,
    chatSafety: 'default',
  },
  secondary: {
    model: 'gpt-3.5-turbo',
    baseUrl: OPENAI_BASE_URL,
    timeoutMs: 60000,
    maxTokens: 400,
    temperature: 0.3,
  },
  credentials: {
    primaryKeyPrefix: 'AIza',
    secondaryKeyPrefix: 'sk-',
    probePrompt: 'Test',
    probeTimeoutMs: 15000,
    probeMaxTokens: 16,
  },
  debug: {
    loggingEnabled: false,
  },
};

const ENDPOINT_SCHEMA = {
  type: 'object',
  properties: {
    model: { type: 'string', minLength: 1 },
    baseUrl: { type: 'string', format: 'uri' },
    timeoutMs: { type: 'integer', minimum: 1 },
    maxTokens: { type: 'integer', minimum: 1 },
    temperature: { type: 'number', minimum: 0, maximum: 2 },
  },
};

/**
 * Embedded schema for chatrelay.json
 */
export const RUNTIME_CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'chatrelay configuration',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    primary: {
      ...ENDPOINT_SCHEMA,
      properties: {
        ...ENDPOINT_SCHEMA.properties,
        chatSafety: { enum: ['default', 'relaxed'] },
      },
      additionalProperties: false,
    },
    secondary: {
      ...ENDPOINT_SCHEMA,
      additionalProperties: false,
    },
    credentials: {
      type: 'object',
      properties: {
        primaryKeyPrefix: { type: 'string', minLength: 1 },
        secondaryKeyPrefix: { type: 'string', minLength: 1 },
        probePrompt: { type: 'string', minLength: 1 },
        probeTimeoutMs: { type: 'integer', minimum: 1 },
        probeMaxTokens: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
    debug: {
      type: 'object',
      properties: {
        loggingEnabled: { type: 'boolean' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

export function getRuntimeConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), 'chatrelay.json');
}

function createValidator(): Ajv2020 {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  addFormats(ajv);
  return ajv;
}

/**
 * Validate a parsed chatrelay.json against the embedded schema
 */
export function validateRuntimeConfig(raw: unknown): RuntimeConfigFile {
  const validate = createValidator().compile<RuntimeConfigFile>(RUNTIME_CONFIG_SCHEMA);

  if (!validate(raw)) {
    const errors = (validate.errors || []).map((err) => ({
      path: err.instancePath || '/',
      message: err.message || 'Unknown validation error',
    }));

    throw new ConfigValidationError(
      `Invalid configuration: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      errors
    );
  }

  return raw;
}

function toPositiveInt(value: string | undefined, fallback: number): number {
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }
  return fallback;
}

function toSafetyMode(value: string | undefined, fallback: SafetyMode): SafetyMode {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'default' || normalized === 'relaxed' ? normalized : fallback;
}

function toStringValue(value: string | undefined, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

export function mergeRuntimeConfig(file: RuntimeConfigFile): ChatRelayRuntimeConfig {
  return {
    $schema: DEFAULT_RUNTIME_CONFIG.$schema,
    primary: { ...DEFAULT_RUNTIME_CONFIG.primary, ...file.primary },
    secondary: { ...DEFAULT_RUNTIME_CONFIG.secondary, ...file.secondary },
    credentials: { ...DEFAULT_RUNTIME_CONFIG.credentials, ...file.credentials },
    debug: { ...DEFAULT_RUNTIME_CONFIG.debug, ...file.debug },
  };
}

/**
 * Layer environment overrides on top of a resolved configuration.
 */
export function applyEnvironmentOverrides(
  config: ChatRelayRuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): ChatRelayRuntimeConfig {
  const timeoutMs = env.CHATRELAY_TIMEOUT_MS;
  return {
    ...config,
    primary: {
      ...config.primary,
      model: toStringValue(env.CHATRELAY_PRIMARY_MODEL, config.primary.model),
      timeoutMs: toPositiveInt(timeoutMs, config.primary.timeoutMs),
      chatSafety: toSafetyMode(env.CHATRELAY_CHAT_SAFETY, config.primary.chatSafety),
    },
    secondary: {
      ...config.secondary,
      model: toStringValue(env.CHATRELAY_SECONDARY_MODEL, config.secondary.model),
      timeoutMs: toPositiveInt(timeoutMs, config.secondary.timeoutMs),
    },
    debug: {
      loggingEnabled: env.CHATRELAY_DEBUG !== undefined
        ? env.CHATRELAY_DEBUG === '1'
        : config.debug.loggingEnabled,
    },
  };
}

/**
 * Load configuration from chatrelay.json (if present), then apply environment overrides.
 * Throws ConfigValidationError if the file is unreadable JSON or fails the schema.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): ChatRelayRuntimeConfig {
  const configPath = getRuntimeConfigPath(env);

  if (!fs.existsSync(configPath)) {
    return applyEnvironmentOverrides(mergeRuntimeConfig({}), env);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Invalid configuration: ${message}`, [{ path: '/', message }]);
  }

  return applyEnvironmentOverrides(mergeRuntimeConfig(validateRuntimeConfig(parsed)), env);
}
