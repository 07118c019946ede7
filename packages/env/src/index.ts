export {
  envSchema,
  getKudaRequestUrl,
  getLogLevel,
  getNodeEnv,
  getRequestTimeoutMs,
  isProduction,
  isTest,
  parseEnv,
  resetEnvCache,
  type ValidatedEnv,
} from './config.js';
