const settingsSchema = {
  PORT: { type: 'number', default: '8000' },
  UPLOAD_DIR: { type: 'string', default: 'data/uploads' },
  DB_PATH: { type: 'string', default: 'data/vector-store.sqlite' },
  COLLECTION_NAME: { type: 'string', default: 'study_documents' },
  CHUNK_SIZE: { type: 'number', default: '1000' },
  CHUNK_OVERLAP: { type: 'count', default: '200' },
  RAG_RELEVANT_CHUNK_COUNT: { type: 'number', default: '5' },
  MAX_CONTEXT_CHARS: { type: 'number', default: '6000' },
  FILE_SIZE_MAX_MB: { type: 'number', default: '50' },
  FILE_CONCURRENCY_PROCESS_LIMIT: { type: 'number', default: '4' },

  OLLAMA_BASE_URL: { type: 'string', default: 'http://localhost:11434' },
  OLLAMA_MODEL: { type: 'string', default: 'llama2' },
  OLLAMA_TIMEOUT_MS: { type: 'number', default: '90000' },
  EMBEDDING_MODEL: { type: 'string', default: 'all-minilm' },
} as const;

type SettingKey = keyof typeof settingsSchema;

export interface AppConfig {
  isDev: boolean;
  port: number;
  uploadDir: string;
  dbPath: string;
  collectionName: string;
  chunkSize: number;
  chunkOverlap: number;
  defaultResultCount: number;
  maxContextChars: number;
  maxFileSizeBytes: number;
  embeddingConcurrency: number;
  ollama: {
    baseUrl: string;
    defaultModel: string;
    timeoutMs: number;
  };
  embeddingModel: string;
}

function readSetting(env: NodeJS.ProcessEnv, key: SettingKey): string {
  const { type, default: fallback } = settingsSchema[key];
  const value = env[key]?.trim() || fallback;
  if (type === 'number' && (isNaN(Number(value)) || Number(value) <= 0)) {
    throw new Error(`${key} must be a positive number.`);
  }
  // counts may be zero
  if (type === 'count' && (isNaN(Number(value)) || Number(value) < 0)) {
    throw new Error(`${key} must be a non-negative number.`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const setting = (key: SettingKey) => readSetting(env, key);
  const numeric = (key: SettingKey) => Number(readSetting(env, key));

  const chunkSize = numeric('CHUNK_SIZE');
  const chunkOverlap = numeric('CHUNK_OVERLAP');
  if (chunkOverlap >= chunkSize) {
    throw new Error('CHUNK_OVERLAP must be smaller than CHUNK_SIZE.');
  }

  return {
    isDev: env.NODE_ENV === 'DEV',
    port: numeric('PORT'),
    uploadDir: setting('UPLOAD_DIR'),
    dbPath: setting('DB_PATH'),
    collectionName: setting('COLLECTION_NAME'),
    chunkSize,
    chunkOverlap,
    defaultResultCount: numeric('RAG_RELEVANT_CHUNK_COUNT'),
    maxContextChars: numeric('MAX_CONTEXT_CHARS'),
    maxFileSizeBytes: numeric('FILE_SIZE_MAX_MB') * 1024 * 1024,
    embeddingConcurrency: numeric('FILE_CONCURRENCY_PROCESS_LIMIT'),
    ollama: {
      baseUrl: setting('OLLAMA_BASE_URL').replace(/\/+$/, ''),
      defaultModel: setting('OLLAMA_MODEL'),
      timeoutMs: numeric('OLLAMA_TIMEOUT_MS'),
    },
    embeddingModel: setting('EMBEDDING_MODEL'),
  };
}
