import { z } from 'zod';
import { DEFAULT_BM25_OPTIONS, DEFAULT_VERIFIER_CONFIG } from '@claimtrace/core';

const unitInterval = z.number().min(0).max(1);

const retrievalSchema = z.object({
  top_k: z.number().int().positive().optional(),
  k1: z.number().positive().optional(),
  b: unitInterval.optional(),
  epsilon: z.number().min(0).optional(),
}).strict();

const verificationSchema = z.object({
  min_score: z.number().min(0).optional(),
  prohibition_overlap: unitInterval.optional(),
  support_overlap: unitInterval.optional(),
  log_limit: z.number().int().positive().optional(),
  negation_words: z.array(z.string().min(1)).optional(),
}).strict();

const inputsSchema = z.object({
  docs: z.string().optional(),
  questions: z.string().optional(),
  claims: z.string().optional(),
}).strict();

const outputSchema = z.object({
  dir: z.string().optional(),
  report: z.boolean().optional(),
}).strict();

const ConfigSchema = z.object({
  retrieval: retrievalSchema.optional(),
  verification: verificationSchema.optional(),
  inputs: inputsSchema.optional(),
  output: outputSchema.optional(),
}).strict();

export interface RetrievalConfig {
  top_k: number;
  k1: number;
  b: number;
  epsilon: number;
}

export interface VerificationConfig {
  min_score: number;
  prohibition_overlap: number;
  support_overlap: number;
  log_limit: number;
  negation_words: string[];
}

export interface InputsConfig {
  docs?: string;
  questions?: string;
  claims?: string;
}

export interface OutputConfig {
  dir: string;
  report: boolean;
}

export interface Config {
  retrieval: RetrievalConfig;
  verification: VerificationConfig;
  inputs: InputsConfig;
  output: OutputConfig;
}

export const ConfigDefaults: Config = {
  retrieval: {
    top_k: DEFAULT_VERIFIER_CONFIG.topK,
    k1: DEFAULT_BM25_OPTIONS.k1,
    b: DEFAULT_BM25_OPTIONS.b,
    epsilon: DEFAULT_BM25_OPTIONS.epsilon,
  },
  verification: {
    min_score: DEFAULT_VERIFIER_CONFIG.minScore,
    prohibition_overlap: DEFAULT_VERIFIER_CONFIG.prohibitionOverlap,
    support_overlap: DEFAULT_VERIFIER_CONFIG.supportOverlap,
    log_limit: DEFAULT_VERIFIER_CONFIG.logLimit,
    negation_words: [...DEFAULT_VERIFIER_CONFIG.negationWords],
  },
  inputs: {},
  output: {
    dir: './outputs',
    report: false,
  },
};

/** Deep copy of {@link ConfigDefaults}. */
export function cloneDefaults(): Config {
  return {
    retrieval: { ...ConfigDefaults.retrieval },
    verification: {
      ...ConfigDefaults.verification,
      negation_words: [...ConfigDefaults.verification.negation_words],
    },
    inputs: { ...ConfigDefaults.inputs },
    output: { ...ConfigDefaults.output },
  };
}

export { ConfigSchema };
