export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
  connectTimeoutMs: number;
  /** 0 disables the per-session statement timeout */
  statementTimeoutMs: number;
}

export type EnvReader = (key: string) => string | undefined;

const readNonNegativeInt = (
  read: EnvReader,
  key: string,
  fallback: number,
): number => {
  const raw = read(key);
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

/**
 * Resolves the database connection settings once at startup.
 *
 * The reader is usually backed by ConfigService so that `.env` values are
 * honoured; tests pass a plain object lookup.
 */
export const getDatabaseConfig = (read: EnvReader): DatabaseConfig => {
  const database = read("DB_NAME") || "gesture_serving";

  // Tests must never point at a development or production schema
  if (read("NODE_ENV") === "test" && !database.includes("test")) {
    throw new Error(
      `NODE_ENV=test but DB_NAME="${database}" does not contain "test"`,
    );
  }

  return {
    host: read("DB_HOST") || "localhost",
    port: readNonNegativeInt(read, "DB_PORT", 3306),
    user: read("DB_USER") || "root",
    password: read("DB_PASSWORD") ?? "",
    database,
    synchronize: read("DB_SYNCHRONIZE") === "true",
    logging: read("DB_LOGGING") === "true",
    connectTimeoutMs: readNonNegativeInt(read, "DB_CONNECT_TIMEOUT_MS", 10000),
    statementTimeoutMs: readNonNegativeInt(read, "DB_STATEMENT_TIMEOUT_MS", 0),
  };
};
