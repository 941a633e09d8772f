import Joi from 'joi';

// identity=token pairs; identities and tokens may not contain separators or whitespace.
const PRINCIPALS_PATTERN = /^[^\s=,]+=[^\s=,]+(,[^\s=,]+=[^\s=,]+)*$/;

export const envValidationSchema = Joi.object({
  PORT: Joi.number().port().default(3000),
  LOG_LEVEL: Joi.string().valid('fatal', 'error', 'warn', 'info', 'debug', 'trace').default('info'),
  // Max JSON body size in bytes enforced by Fastify.
  LEDGER_BODY_LIMIT: Joi.number().integer().min(1024).default(65536),
  // Empty disables the ledger store; ledger routes then answer 503.
  LEDGER_REDIS_URL: Joi.string().uri().allow('').default('redis://localhost:6379'),
  LEDGER_REDIS_PREFIX: Joi.string().default('key-ledger'),
  // Empty means no principal can authenticate.
  LEDGER_PRINCIPALS: Joi.string()
    .allow('')
    .pattern(PRINCIPALS_PATTERN)
    .default('')
    .messages({
      'string.pattern.base': 'LEDGER_PRINCIPALS must be comma-separated identity=token pairs',
    }),
});
