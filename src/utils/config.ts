// Utilities: Configuration management
// Pure functions, no external dependencies

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigins: string[];
}

export interface LLMConfig {
  apiKey: string;
  baseUrl?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutSeconds: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface GameDefaults {
  dbPath: string;
  contentDir?: string;
  inventoryLimit: number;
  maxRestCount: number;
  /** Set to replay the same dice from a fixed seed */
  diceSeed: number | null;
}

export interface AppConfig {
  server: ServerConfig;
  llm: LLMConfig;
  game: GameDefaults;
}

function parseNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || 'localhost',
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
  };
}

export function buildLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  return {
    apiKey: (env.OPENAI_API_KEY || '').trim(),
    baseUrl: env.OPENAI_BASE_URL || undefined,
    model: env.LLM_MODEL || 'gpt-4o-mini',
    temperature: parseFloat(env.LLM_TEMPERATURE || '0.6'),
    maxTokens: parseInt(env.LLM_MAX_TOKENS || '150', 10),
    timeoutSeconds: parseInt(env.LLM_TIMEOUT_SECONDS || '30', 10),
    maxRetries: parseInt(env.LLM_MAX_RETRIES || '3', 10),
    retryBaseDelayMs: parseInt(env.LLM_RETRY_BASE_DELAY_MS || '1000', 10),
  };
}

export function buildGameDefaults(env: NodeJS.ProcessEnv = process.env): GameDefaults {
  return {
    dbPath: env.DB_PATH || './data/adventure.json',
    contentDir: env.CONTENT_DIR || undefined,
    inventoryLimit: parseInt(env.INVENTORY_LIMIT || '10', 10),
    maxRestCount: parseInt(env.MAX_REST_COUNT || '20', 10),
    diceSeed: env.DICE_SEED ? parseInt(env.DICE_SEED, 10) : null,
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    llm: buildLLMConfig(env),
    game: buildGameDefaults(env),
  };
}

// Validation
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (config.llm.temperature < 0 || config.llm.temperature > 2) {
    errors.push('Temperature must be between 0 and 2');
  }

  if (config.llm.maxRetries < 1) {
    errors.push('LLM_MAX_RETRIES must be at least 1');
  }

  if (config.game.inventoryLimit < 0) {
    errors.push('INVENTORY_LIMIT cannot be negative');
  }

  if (config.game.diceSeed !== null && Number.isNaN(config.game.diceSeed)) {
    errors.push('DICE_SEED must be an integer');
  }

  return errors;
}

/**
 * Non-fatal configuration issues
 */
export function configWarnings(config: AppConfig): string[] {
  const warnings: string[] = [];
  if (!config.llm.apiKey) {
    warnings.push('OPENAI_API_KEY not set - narration runs in stub mode');
  }
  return warnings;
}
