declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string
    DEV_LOG?: string
    DATA_DIR?: string
    LLM_PROVIDER?: string
    LLM_MODEL?: string
    LLM_MAX_ATTEMPTS?: string
    LLM_BACKOFF_MS?: string
    SCORING_TIMEOUT_MS?: string
    MAX_NEIGHBORS?: string
    PORT?: string
  }
}
