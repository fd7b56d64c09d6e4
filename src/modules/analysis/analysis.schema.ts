import Joi from 'joi';
import { AnalysisRequest } from './types/analysis.types';

export const DEFAULT_SUGGESTION_COUNT = 3;

export const analysisRequestSchema = Joi.object<AnalysisRequest>({
  password: Joi.string().allow('').required(),
  enableOnline: Joi.boolean().default(false),
  timeoutMs: Joi.number().integer().positive(),
  suggestionCount: Joi.number()
    .integer()
    .min(1)
    .max(20)
    .default(DEFAULT_SUGGESTION_COUNT),
  signal: Joi.object().instance(AbortSignal),
}).required();
