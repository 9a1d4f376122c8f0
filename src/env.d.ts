declare namespace NodeJS {
  interface ProcessEnv {
    PORT?: string;
    HOST?: string;
    LOG_LEVEL?: string;        // fatal | error | warn | info | debug | trace | silent
    LOG_FORMAT?: string;       // morgan format, e.g. dev, combined
    CORS_ORIGINS?: string;     // comma separated, or *
    TODO_STORE?: string;       // sqlite | memory
    DATABASE_PATH?: string;    // file path or :memory:
  }
}
