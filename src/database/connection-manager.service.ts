import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from "@nestjs/common";
import {
  DataSource,
  DataSourceOptions,
  EntityTarget,
  ObjectLiteral,
  Repository,
} from "typeorm";
import { MysqlDriver } from "typeorm/driver/mysql/MysqlDriver";
import type { Pool, PoolConnection } from "mysql2";
import { DatabaseConfig } from "../config/database.config";
import { ConnectionError } from "../common/errors/storage.errors";
import { DATABASE_CONFIG, DATA_SOURCE_OPTIONS } from "./database.constants";

const SET_STATEMENT_TIMEOUT = "SET SESSION max_execution_time = ?";

/**
 * ConnectionManager
 *
 * Holds one lazily established DataSource for the application:
 * - connect() opens it, leaving the manager disconnected on failure
 * - acquire() returns the live handle, reconnecting when it is gone
 * - close() releases it and may be called any number of times
 *
 * No pooling beyond the driver's single connection and no transactions;
 * every statement autocommits.
 */
@Injectable()
export class ConnectionManager implements OnModuleDestroy {
  private readonly logger = new Logger(ConnectionManager.name);
  private dataSource: DataSource | null = null;
  private connecting: Promise<DataSource> | null = null;

  constructor(
    @Inject(DATA_SOURCE_OPTIONS)
    private readonly options: DataSourceOptions,
    @Inject(DATABASE_CONFIG)
    private readonly dbConfig: DatabaseConfig,
  ) {}

  async connect(): Promise<DataSource> {
    // Concurrent callers wait for the same attempt
    if (!this.connecting) {
      this.connecting = this.openDataSource().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  async acquire(): Promise<DataSource> {
    if (this.dataSource?.isInitialized) {
      return this.dataSource;
    }
    return this.connect();
  }

  async repository<T extends ObjectLiteral>(
    entity: EntityTarget<T>,
  ): Promise<Repository<T>> {
    const dataSource = await this.acquire();
    return dataSource.getRepository(entity);
  }

  /**
   * Round-trip check used by the health endpoint. Never throws.
   */
  async ping(): Promise<boolean> {
    try {
      const dataSource = await this.acquire();
      await dataSource.query("SELECT 1");
      return true;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.warn(`Database ping failed: ${errorMessage}`);
      return false;
    }
  }

  isConnected(): boolean {
    return this.dataSource?.isInitialized ?? false;
  }

  async close(): Promise<void> {
    // An attempt still in flight would otherwise open after shutdown
    if (this.connecting) {
      await Promise.allSettled([this.connecting]);
    }

    const dataSource = this.dataSource;
    this.dataSource = null;

    if (dataSource?.isInitialized) {
      await dataSource.destroy();
      this.logger.log("Database connection closed");
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  private async openDataSource(): Promise<DataSource> {
    const target = `${this.dbConfig.host}:${this.dbConfig.port}/${this.dbConfig.database}`;
    this.logger.log(`Connecting to ${this.options.type} at ${target}...`);

    const dataSource = new DataSource(this.options);
    try {
      await dataSource.initialize();
      await this.applyStatementTimeout(dataSource);
    } catch (error) {
      this.dataSource = null;
      if (dataSource.isInitialized) {
        await dataSource.destroy();
      }
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.error(`Connection to ${target} failed: ${errorMessage}`);
      throw new ConnectionError(`Could not connect to database at ${target}`, {
        cause: error,
      });
    }

    this.dataSource = dataSource;
    this.logger.log("Database connected");
    return dataSource;
  }

  /**
   * Sets max_execution_time on the session the pool already holds and on
   * every connection it opens later, e.g. after the server dropped one.
   */
  private async applyStatementTimeout(dataSource: DataSource): Promise<void> {
    const timeoutMs = this.dbConfig.statementTimeoutMs;
    if (timeoutMs <= 0 || !(dataSource.driver instanceof MysqlDriver)) {
      return;
    }

    const pool: Pool = dataSource.driver.pool;
    pool.on("connection", (connection: PoolConnection) => {
      connection.query(SET_STATEMENT_TIMEOUT, [timeoutMs], (error) => {
        if (error) {
          this.logger.error(
            `Could not set statement timeout on new connection: ${error.message}`,
          );
        }
      });
    });

    await dataSource.query(SET_STATEMENT_TIMEOUT, [timeoutMs]);
  }
}
