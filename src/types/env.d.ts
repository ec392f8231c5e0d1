declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string;
    LOG_LEVEL?: string;
    PORT?: string;
    UPLOAD_DIR?: string;
    DB_PATH?: string;
    COLLECTION_NAME?: string;
    CHUNK_SIZE?: string;
    CHUNK_OVERLAP?: string;
    RAG_RELEVANT_CHUNK_COUNT?: string;
    MAX_CONTEXT_CHARS?: string;
    FILE_SIZE_MAX_MB?: string;
    FILE_CONCURRENCY_PROCESS_LIMIT?: string;

    OLLAMA_BASE_URL?: string;
    OLLAMA_MODEL?: string;
    OLLAMA_TIMEOUT_MS?: string;
    EMBEDDING_MODEL?: string;
  }
}
