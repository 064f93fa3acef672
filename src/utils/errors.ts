export class MalformedRecordError extends Error {
  code = 'MALFORMED_RECORD';
  constructor(
    message: string,
    public incidentId?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'MalformedRecordError';
  }
}

export class GraphPersistenceError extends Error {
  code = 'GRAPH_PERSISTENCE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'GraphPersistenceError';
  }
}

export class StoreWriteFailureError extends Error {
  code = 'STORE_WRITE_FAILURE';
  constructor(
    message: string,
    public incidentId: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'StoreWriteFailureError';
  }
}

export class EmbeddingServiceError extends Error {
  code = 'EMBEDDING_SERVICE_FAILURE';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'EmbeddingServiceError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
