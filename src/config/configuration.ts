import { registerAs } from '@nestjs/config';
import Joi from 'joi';

export interface AppConfig {
  breachCorpusPaths: string[];
  wordlistPath: string;
  pwnedRangeApiUrl: string;
  onlineLookupTimeoutMs: number;
  suggestionMaxAttempts: number;
  logLevel: string;
}

export default registerAs('app', (): AppConfig => {
  const env = process.env;
  return {
    breachCorpusPaths: (
      env.BREACH_CORPUS_PATHS || 'data/breached-passwords.txt'
    )
      .split(',')
      .map((path) => path.trim())
      .filter(Boolean),
    wordlistPath: env.WORDLIST_PATH || 'data/common-words.txt',
    pwnedRangeApiUrl:
      env.PWNED_RANGE_API_URL || 'https://api.pwnedpasswords.com/range',
    onlineLookupTimeoutMs: Number(env.ONLINE_LOOKUP_TIMEOUT_MS) || 5000,
    suggestionMaxAttempts: Number(env.SUGGESTION_MAX_ATTEMPTS ?? 25),
    logLevel: env.LOG_LEVEL || 'warn',
  };
});

export const configValidationSchema = Joi.object({
  BREACH_CORPUS_PATHS: Joi.string().default('data/breached-passwords.txt'),
  WORDLIST_PATH: Joi.string().default('data/common-words.txt'),
  PWNED_RANGE_API_URL: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .default('https://api.pwnedpasswords.com/range'),
  ONLINE_LOOKUP_TIMEOUT_MS: Joi.number().integer().positive().default(5000),
  SUGGESTION_MAX_ATTEMPTS: Joi.number().integer().min(0).default(25),
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'log', 'debug', 'verbose')
    .default('warn'),
});
