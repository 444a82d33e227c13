/**
 * Centralized environment configuration.
 * Everything the service reads from the environment goes through loadConfig().
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface AppConfig {
  server: {
    port: number;
    nodeEnv: string;
    corsOrigins: string[];
  };
  mongo: {
    url: string;
    dbName: string;
    vectorIndexName: string;
  };
  auth: {
    jwtSecret: string;
    cookieSecret: string;
    accessTokenExpireMinutes: number;
  };
  openai: {
    apiKey: string;
    embeddingModel: string;
    chatModel: string;
    rateLimitRpm: number;
    retryAttempts: number;
    embeddingDimension: number;
    embeddingBatchSize: number;
  };
  processing: {
    maxFileSize: number;
    chunkSize: number;
    chunkOverlap: number;
  };
  retrieval: {
    similarityThreshold: number;
    maxResults: number;
  };
  storage: {
    region: string;
    accessKeyId: string;
    secretAccessKey: string;
    bucket: string;
    signedUrlTtlSeconds: number;
  };
  apiRateLimitRpm: number;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const missing: string[] = [];

  const required = (key: string): string => {
    const value = env[key]?.trim();
    if (!value) {
      missing.push(key);
      return "";
    }
    return value;
  };

  const optional = (key: string, fallback: string): string => {
    const value = env[key]?.trim();
    return value ? value : fallback;
  };

  const int = (key: string, fallback: number): number => {
    const n = Number.parseInt(env[key] ?? "", 10);
    return Number.isFinite(n) ? n : fallback;
  };

  const float = (key: string, fallback: number): number => {
    const n = Number.parseFloat(env[key] ?? "");
    return Number.isFinite(n) ? n : fallback;
  };

  const jwtSecret = required("JWT_SECRET");

  const config: AppConfig = {
    server: {
      port: int("PORT", 3000),
      nodeEnv: optional("NODE_ENV", "development"),
      corsOrigins: optional("CORS_ORIGINS", "http://localhost:5173")
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean),
    },
    mongo: {
      url: required("MONGODB_URL"),
      dbName: optional("MONGODB_DB_NAME", "docufill"),
      vectorIndexName: optional("VECTOR_INDEX_NAME", "chunk_embedding_index"),
    },
    auth: {
      jwtSecret,
      cookieSecret: optional("COOKIE_SECRET", jwtSecret),
      accessTokenExpireMinutes: int("ACCESS_TOKEN_EXPIRE_MINUTES", 30),
    },
    openai: {
      apiKey: required("OPENAI_API_KEY"),
      embeddingModel: optional("OPENAI_EMBEDDING_MODEL", "text-embedding-3-small"),
      chatModel: optional("OPENAI_CHAT_MODEL", "gpt-3.5-turbo"),
      rateLimitRpm: int("OPENAI_RATE_LIMIT_RPM", 60),
      retryAttempts: int("OPENAI_RETRY_ATTEMPTS", 3),
      embeddingDimension: int("EMBEDDING_DIMENSION", 1536),
      embeddingBatchSize: int("EMBEDDING_BATCH_SIZE", 100),
    },
    processing: {
      maxFileSize: int("MAX_FILE_SIZE", 10 * 1024 * 1024),
      chunkSize: int("CHUNK_SIZE", 1000),
      chunkOverlap: int("CHUNK_OVERLAP", 200),
    },
    retrieval: {
      similarityThreshold: float("SIMILARITY_THRESHOLD", 0.75),
      maxResults: int("MAX_RESULTS", 5),
    },
    storage: {
      region: required("AWS_REGION"),
      accessKeyId: required("AWS_ACCESS_KEY"),
      secretAccessKey: required("AWS_SECRET"),
      bucket: required("AWS_S3_BUCKET_NAME"),
      signedUrlTtlSeconds: int("SIGNED_URL_TTL_SECONDS", 120),
    },
    apiRateLimitRpm: int("API_RATE_LIMIT_RPM", 30),
  };

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }

  const { chunkSize, chunkOverlap } = config.processing;
  if (chunkSize <= 0 || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ConfigError(
      `CHUNK_OVERLAP (${chunkOverlap}) must be at least 0 and smaller than CHUNK_SIZE (${chunkSize})`
    );
  }

  return config;
}
