/**
 * Model configuration loader.
 *
 * Builds a ModelRouterConfig from:
 *   1. A JSON file at MODEL_CONFIG_PATH (optional)
 *   2. Environment variable overrides: DEFAULT_MODEL, ROUTER_MODEL
 *   3. Defaults derived from whichever API keys are present
 */

import { readFile } from 'node:fs/promises';
import { logger } from './logger.js';
import type {
  ModelRouterConfig,
  ModelDefinition,
  ModelProvider,
  ModelRole,
  ProviderConfig,
  ModelRoles,
} from './model-types.js';

const log = logger.child({ module: 'model-config' });

const PROVIDERS: readonly ModelProvider[] = ['anthropic', 'openai', 'ollama', 'openai-compatible'];

// ---------------------------------------------------------------------------
// Default configuration
// ---------------------------------------------------------------------------

function defaultProviders(): Partial<Record<ModelProvider, ProviderConfig>> {
  const providers: Partial<Record<ModelProvider, ProviderConfig>> = {};

  const anthropicKey = process.env.ANTHROPIC_API_KEY;
  if (anthropicKey) {
    providers.anthropic = { provider: 'anthropic', apiKey: anthropicKey };
  }

  const openaiKey = process.env.OPENAI_API_KEY;
  if (openaiKey) {
    providers.openai = { provider: 'openai', apiKey: openaiKey };
  }

  return providers;
}

const ANTHROPIC_MODELS: ModelDefinition[] = [
  { id: 'sonnet-4', modelName: 'claude-sonnet-4-20250514', provider: 'anthropic', maxTokens: 4096 },
  { id: 'haiku-4.5', modelName: 'claude-haiku-4-5-20251001', provider: 'anthropic', maxTokens: 2048 },
];

const OPENAI_MODELS: ModelDefinition[] = [
  { id: 'gpt-4o', modelName: 'gpt-4o', provider: 'openai', maxTokens: 4096 },
  { id: 'gpt-4o-mini', modelName: 'gpt-4o-mini', provider: 'openai', maxTokens: 2048 },
];

/**
 * Anthropic wins when both keys are present. With no keys at all the
 * Anthropic defaults are returned and validation reports the missing provider.
 */
export function createDefaultConfig(): ModelRouterConfig {
  const providers = defaultProviders();
  const models: ModelDefinition[] = [];
  if (providers.anthropic || !providers.openai) models.push(...ANTHROPIC_MODELS.map((m) => ({ ...m })));
  if (providers.openai) models.push(...OPENAI_MODELS.map((m) => ({ ...m })));

  const roles: ModelRoles = providers.anthropic || !providers.openai
    ? { agent: 'sonnet-4', router: 'haiku-4.5' }
    : { agent: 'gpt-4o', router: 'gpt-4o-mini' };

  return { providers, models, roles };
}

// ---------------------------------------------------------------------------
// Runtime config shape validation
// ---------------------------------------------------------------------------

function isProvider(value: unknown): value is ModelProvider {
  return typeof value === 'string' && PROVIDERS.some((p) => p === value);
}

function validateConfigShape(parsed: unknown): parsed is ModelRouterConfig {
  if (!parsed || typeof parsed !== 'object') return false;
  const obj = parsed as Record<string, unknown>;
  if (!obj.providers || typeof obj.providers !== 'object') return false;
  if (!Array.isArray(obj.models)) return false;
  if (!obj.roles || typeof obj.roles !== 'object') return false;
  if (!('agent' in obj.roles) || typeof obj.roles.agent !== 'string') return false;
  if (obj.fallbackChain !== undefined && !Array.isArray(obj.fallbackChain)) return false;
  for (const m of obj.models) {
    if (!m || typeof m !== 'object') return false;
    const model = m as Record<string, unknown>;
    if (typeof model.id !== 'string' || typeof model.modelName !== 'string') return false;
    if (!isProvider(model.provider)) return false;
    if (typeof model.maxTokens !== 'number') return false;
  }
  return true;
}

// ---------------------------------------------------------------------------
// File-based config loading
// ---------------------------------------------------------------------------

async function loadConfigFromFile(path: string): Promise<ModelRouterConfig> {
  const raw = await readFile(path, 'utf-8');
  const parsed: unknown = JSON.parse(raw);

  if (!validateConfigShape(parsed)) {
    throw new Error(
      `model-config: invalid config file at '${path}'. ` +
        'Expected an object with "providers" (object), "models" (array of {id, modelName, provider, maxTokens}), and "roles" (object with "agent").',
    );
  }

  return parsed;
}

// ---------------------------------------------------------------------------
// Environment variable overrides
// ---------------------------------------------------------------------------

/** Point a role at a known model id/name, or register the value as an ad-hoc model */
function overrideRole(config: ModelRouterConfig, role: ModelRole, value: string, maxTokens: number): void {
  const existing = config.models.find((m) => m.id === value || m.modelName === value);
  if (existing) {
    config.roles[role] = existing.id;
    return;
  }
  const adHocId = `custom-${role}`;
  config.models.push({
    id: adHocId,
    modelName: value,
    provider: guessProvider(value, config),
    maxTokens,
  });
  config.roles[role] = adHocId;
}

function applyEnvOverrides(config: ModelRouterConfig): ModelRouterConfig {
  const defaultModel = process.env.DEFAULT_MODEL;
  if (defaultModel) {
    overrideRole(config, 'agent', defaultModel, 4096);
    log.info({ defaultModel, agentRole: config.roles.agent }, 'DEFAULT_MODEL override applied');
  }

  const routerModel = process.env.ROUTER_MODEL;
  if (routerModel) {
    overrideRole(config, 'router', routerModel, 2048);
    log.info({ routerModel, routerRole: config.roles.router }, 'ROUTER_MODEL override applied');
  }

  return config;
}

/** Best-effort guess of provider based on model name, validated against config */
function guessProvider(modelName: string, config: ModelRouterConfig): ModelProvider {
  let guessed: ModelProvider;

  if (modelName.startsWith('claude')) {
    guessed = 'anthropic';
  } else if (/^(gpt-|o\d)/.test(modelName)) {
    guessed = 'openai';
  } else if (config.providers.ollama) {
    guessed = 'ollama';
  } else if (config.providers['openai-compatible']) {
    guessed = 'openai-compatible';
  } else {
    guessed = 'anthropic';
  }

  if (!config.providers[guessed]) {
    throw new Error(
      `Model '${modelName}' appears to be a ${guessed} model but no ${guessed} provider is configured`,
    );
  }

  return guessed;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateConfig(config: ModelRouterConfig): void {
  if (Object.keys(config.providers).length === 0) {
    throw new Error(
      'model-config: no providers configured. Set ANTHROPIC_API_KEY or OPENAI_API_KEY at minimum.',
    );
  }

  for (const [role, modelId] of Object.entries(config.roles)) {
    if (!modelId) continue;
    const model = config.models.find((m) => m.id === modelId);
    if (!model) {
      throw new Error(
        `model-config: role '${role}' references unknown model id '${modelId}'. ` +
          `Available models: ${config.models.map((m) => m.id).join(', ')}`,
      );
    }
    if (!config.providers[model.provider]) {
      throw new Error(
        `model-config: model '${model.id}' uses provider '${model.provider}' but no config exists for that provider.`,
      );
    }
  }

  if (config.fallbackChain) {
    for (const modelId of config.fallbackChain) {
      if (!config.models.find((m) => m.id === modelId)) {
        throw new Error(
          `model-config: fallback chain references unknown model id '${modelId}'.`,
        );
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load and return a fully resolved ModelRouterConfig.
 *
 * Resolution order:
 *   1. If MODEL_CONFIG_PATH is set, load from that JSON file
 *   2. Otherwise use built-in defaults
 *   3. Apply env-var overrides (DEFAULT_MODEL, ROUTER_MODEL)
 *   4. Validate the final config
 */
export async function loadModelConfig(): Promise<ModelRouterConfig> {
  let config: ModelRouterConfig;

  const configPath = process.env.MODEL_CONFIG_PATH;
  if (configPath) {
    log.info({ configPath }, 'loading model config from file');
    config = await loadConfigFromFile(configPath);
  } else {
    log.info('using default model config');
    config = createDefaultConfig();
  }

  config = applyEnvOverrides(config);
  validateConfig(config);

  log.info(
    {
      providers: Object.keys(config.providers),
      models: config.models.map((m) => m.id),
      roles: config.roles,
    },
    'model config loaded',
  );

  return config;
}
