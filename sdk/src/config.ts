import dotenv from 'dotenv';
import { z } from 'zod';
import { OpenAIEmbeddings } from './embeddings/OpenAIEmbeddings';
import { Models } from './providers';
import { MemoryVectorStore } from './storage/MemoryVectorStore';
import { SQLiteProductStore } from './storage/SQLiteProductStore';
import { ConsoleLogger } from './utils/ConsoleLogger';
import { InvalidConfigError } from './types';
import type { ClientConfig, ProviderConfig, ProviderType, SqlSafetyPolicy } from './types';

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1, 'is required'),
  ANTHROPIC_API_KEY: optionalKey,
  GOOGLE_API_KEY: optionalKey,
  SHOPCHAIN_PROVIDER: z.enum(['openai', 'anthropic', 'google']).default('openai'),
  SHOPCHAIN_MODEL: z.string().trim().min(1).default(Models.OpenAI.GPT5_MINI),
  SHOPCHAIN_EMBEDDING_MODEL: z
    .string()
    .trim()
    .min(1)
    .default(Models.Embeddings.TEXT_EMBEDDING_3_SMALL),
  SHOPCHAIN_PRODUCT_DB: z.string().trim().min(1).default('./db.sqlite'),
  SHOPCHAIN_FAQ_COLLECTION: z.string().trim().min(1).default('faqs'),
  SHOPCHAIN_SQL_SAFETY: z.enum(['substring', 'statement']).default('substring'),
  SHOPCHAIN_DEBUG: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),
});

export interface Settings {
  providers: ProviderConfig;
  provider: ProviderType;
  model: string;
  embeddingModel: string;
  openaiApiKey: string;
  productDbPath: string;
  faqCollection: string;
  sqlSafety: SqlSafetyPolicy;
  debug: boolean;
}

export interface LoadSettingsOptions {
  /**
   * Read a .env file into process.env first. Only applies when `env` is
   * process.env; a caller-supplied object is parsed as given.
   * @default true
   */
  dotenv?: boolean;
  /** Path of the .env file */
  path?: string;
}

/**
 * Read settings from environment variables (and .env), validated with zod
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
  options: LoadSettingsOptions = {}
): Settings {
  if (options.dotenv !== false && env === process.env) {
    dotenv.config(options.path ? { path: options.path } : undefined);
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(issues);
  }

  const values = parsed.data;
  const providers: ProviderConfig = { openai: { apiKey: values.OPENAI_API_KEY } };
  if (values.ANTHROPIC_API_KEY) {
    providers.anthropic = { apiKey: values.ANTHROPIC_API_KEY };
  }
  if (values.GOOGLE_API_KEY) {
    providers.google = { apiKey: values.GOOGLE_API_KEY };
  }

  return {
    providers,
    provider: values.SHOPCHAIN_PROVIDER,
    model: values.SHOPCHAIN_MODEL,
    embeddingModel: values.SHOPCHAIN_EMBEDDING_MODEL,
    openaiApiKey: values.OPENAI_API_KEY,
    productDbPath: values.SHOPCHAIN_PRODUCT_DB,
    faqCollection: values.SHOPCHAIN_FAQ_COLLECTION,
    sqlSafety: values.SHOPCHAIN_SQL_SAFETY,
    debug: values.SHOPCHAIN_DEBUG,
  };
}

/**
 * Build a ClientConfig from settings, defaulting to the in-memory vector
 * store and the SQLite product file. Any field can be overridden.
 */
export function clientConfigFromSettings(
  settings: Settings,
  overrides: Partial<ClientConfig> = {}
): ClientConfig {
  return {
    providers: overrides.providers ?? settings.providers,
    provider: overrides.provider ?? settings.provider,
    model: overrides.model ?? settings.model,
    debug: overrides.debug ?? settings.debug,
    sqlSafety: overrides.sqlSafety ?? settings.sqlSafety,
    faq: overrides.faq ?? { collection: settings.faqCollection },
    chitchat: overrides.chitchat,
    logger: overrides.logger ?? new ConsoleLogger({ level: settings.debug ? 'debug' : 'info' }),
    vectorStore:
      overrides.vectorStore ??
      new MemoryVectorStore(
        new OpenAIEmbeddings({ apiKey: settings.openaiApiKey, model: settings.embeddingModel })
      ),
    productStore: overrides.productStore ?? new SQLiteProductStore(settings.productDbPath),
  };
}
