import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const optionalString = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

const optionalInt = (value: string | undefined): number | undefined => {
  const trimmed = optionalString(value);
  return trimmed !== undefined ? parseInt(trimmed, 10) : undefined;
};

const optionalFloat = (value: string | undefined): number | undefined => {
  const trimmed = optionalString(value);
  return trimmed !== undefined ? parseFloat(trimmed) : undefined;
};

function loadConfig(): Config {
  const rawConfig = {
    server: {
      nodeEnv: optionalString(process.env.NODE_ENV),
      logLevel: optionalString(process.env.LOG_LEVEL),
    },
    neo4j: {
      uri: optionalString(process.env.NEO4J_URI),
      user: optionalString(process.env.NEO4J_USER),
      password: optionalString(process.env.NEO4J_PASSWORD),
      database: optionalString(process.env.NEO4J_DATABASE),
      queryTimeoutMs: optionalInt(process.env.NEO4J_QUERY_TIMEOUT_MS),
    },
    embedding: {
      apiKey: process.env.EMBEDDING_API_KEY || '',
      model: process.env.EMBEDDING_MODEL || '',
      endpoint: optionalString(process.env.EMBEDDING_ENDPOINT),
      apiVersion: optionalString(process.env.EMBEDDING_API_VERSION),
      dimension: optionalInt(process.env.EMBEDDING_DIMENSION),
      batchSize: optionalInt(process.env.EMBEDDING_BATCH_SIZE),
      timeoutMs: optionalInt(process.env.EMBEDDING_TIMEOUT_MS),
    },
    similarity: {
      threshold: optionalFloat(process.env.SIMILARITY_THRESHOLD),
      scorePrecision: optionalInt(process.env.SCORE_PRECISION),
    },
    upsert: {
      concurrency: optionalInt(process.env.UPSERT_CONCURRENCY),
    },
    paths: {
      input: optionalString(process.env.INPUT_PATH),
      cfrReference: optionalString(process.env.CFR_REFERENCE_PATH),
      output: optionalString(process.env.OUTPUT_PATH),
    },
    graph: {
      resetBeforeBuild: process.env.RESET_GRAPH === 'true',
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
