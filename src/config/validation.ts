import { z } from 'zod';

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  neo4j: z.object({
    // Checked when the graph is written; --skip-graph runs leave them unset
    uri: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    database: z.string().min(1).optional(),
    queryTimeoutMs: z.number().int().positive().default(30000),
  }),
  embedding: z.object({
    apiKey: z.string().min(1),
    model: z.string().min(1),
    endpoint: z.string().url().optional(),
    apiVersion: z.string().min(1).optional(),
    dimension: z.number().int().positive().optional(),
    batchSize: z.number().int().positive().max(2048).default(256),
    timeoutMs: z.number().int().positive().default(60000),
  }).refine(e => !e.endpoint || !!e.apiVersion, {
    message: 'EMBEDDING_API_VERSION is required when EMBEDDING_ENDPOINT is set',
    path: ['apiVersion'],
  }),
  similarity: z.object({
    threshold: z.number().min(0).max(1).default(0.8),
    scorePrecision: z.number().int().min(0).max(12).default(4),
  }),
  upsert: z.object({
    concurrency: z.number().int().positive().default(4),
  }),
  paths: z.object({
    input: z.string().min(1).default('./data/processed/ler_kg.jsonl'),
    cfrReference: z.string().min(1).optional(),
    output: z.string().min(1).default('./data/processed/linked_incidents.csv'),
  }),
  graph: z.object({
    resetBeforeBuild: z.boolean().default(false),
  }),
});

export type Config = z.infer<typeof configSchema>;
