import { EnvReader, getDatabaseConfig } from "./database.config";

const readerFor =
  (env: Record<string, string>): EnvReader =>
  (key) =>
    env[key];

describe("getDatabaseConfig", () => {
  it("should fall back to local MySQL defaults", () => {
    expect(getDatabaseConfig(readerFor({}))).toEqual({
      host: "localhost",
      port: 3306,
      user: "root",
      password: "",
      database: "gesture_serving",
      synchronize: false,
      logging: false,
      connectTimeoutMs: 10000,
      statementTimeoutMs: 0,
    });
  });

  it("should read every setting from the environment", () => {
    const config = getDatabaseConfig(
      readerFor({
        DB_HOST: "db.internal",
        DB_PORT: "3307",
        DB_USER: "serving",
        DB_PASSWORD: "test-secret",
        DB_NAME: "gestures_prod",
        DB_SYNCHRONIZE: "true",
        DB_LOGGING: "true",
        DB_CONNECT_TIMEOUT_MS: "2500",
        DB_STATEMENT_TIMEOUT_MS: "30000",
      }),
    );

    expect(config).toEqual({
      host: "db.internal",
      port: 3307,
      user: "serving",
      password: "test-secret",
      database: "gestures_prod",
      synchronize: true,
      logging: true,
      connectTimeoutMs: 2500,
      statementTimeoutMs: 30000,
    });
  });

  it("should treat a blank number as unset", () => {
    const config = getDatabaseConfig(readerFor({ DB_PORT: "  " }));
    expect(config.port).toBe(3306);
  });

  it("should reject a port that is not an integer", () => {
    expect(() => getDatabaseConfig(readerFor({ DB_PORT: "mysql" }))).toThrow(
      'DB_PORT must be a non-negative integer, got "mysql"',
    );
  });

  it("should reject a negative timeout", () => {
    expect(() =>
      getDatabaseConfig(readerFor({ DB_CONNECT_TIMEOUT_MS: "-1" })),
    ).toThrow('DB_CONNECT_TIMEOUT_MS must be a non-negative integer, got "-1"');
  });

  it("should refuse a non-test schema when NODE_ENV=test", () => {
    expect(() => getDatabaseConfig(readerFor({ NODE_ENV: "test" }))).toThrow(
      'NODE_ENV=test but DB_NAME="gesture_serving" does not contain "test"',
    );
  });

  it("should accept a test schema when NODE_ENV=test", () => {
    const config = getDatabaseConfig(
      readerFor({ NODE_ENV: "test", DB_NAME: "gesture_serving_test" }),
    );
    expect(config.database).toBe("gesture_serving_test");
  });
});
