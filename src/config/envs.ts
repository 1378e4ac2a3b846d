import 'dotenv/config';
import * as joi from 'joi';

interface EnvVars {
  NATS_SERVERS: string[];
  AZURE_DI_ENDPOINT?: string;
  AZURE_DI_KEY?: string;
  AZURE_DI_API_VERSION: string;
  AZURE_DI_POLL_INTERVAL_MS: number;
  FUZZY_MATCH_THRESHOLD: number;
  TRADE_KEYWORDS_FILE?: string;
  MAX_DOCUMENT_BYTES: number;
}

const envSchema = joi
  .object<EnvVars>({
    NATS_SERVERS: joi.array().items(joi.string()).min(1).required(),
    AZURE_DI_ENDPOINT: joi.string().uri(),
    AZURE_DI_KEY: joi.string(),
    AZURE_DI_API_VERSION: joi.string().default('2024-11-30'),
    AZURE_DI_POLL_INTERVAL_MS: joi.number().integer().min(0).default(1200),
    FUZZY_MATCH_THRESHOLD: joi.number().min(0).max(100).default(70),
    TRADE_KEYWORDS_FILE: joi.string(),
    MAX_DOCUMENT_BYTES: joi
      .number()
      .integer()
      .min(1)
      .default(20 * 1024 * 1024),
  })
  .and('AZURE_DI_ENDPOINT', 'AZURE_DI_KEY')
  .unknown(true);

const { error, value } = envSchema.validate({
  ...process.env,
  NATS_SERVERS: process.env['NATS_SERVERS']?.split(',').map((item) => item.trim()),
});

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

const envVars = value as EnvVars;

export const envs = {
  natsServers: envVars.NATS_SERVERS,
  azureDiEndpoint: envVars.AZURE_DI_ENDPOINT?.replace(/\/+$/, '') ?? null,
  azureDiKey: envVars.AZURE_DI_KEY ?? null,
  azureDiApiVersion: envVars.AZURE_DI_API_VERSION,
  azureDiPollIntervalMs: envVars.AZURE_DI_POLL_INTERVAL_MS,
  fuzzyMatchThreshold: envVars.FUZZY_MATCH_THRESHOLD,
  tradeKeywordsFile: envVars.TRADE_KEYWORDS_FILE ?? null,
  maxDocumentBytes: envVars.MAX_DOCUMENT_BYTES,
};
