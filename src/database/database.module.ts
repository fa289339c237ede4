import { Global, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { getDatabaseConfig, DatabaseConfig } from "../config/database.config";
import { buildDataSourceOptions } from "../config/typeorm.config";
import { ConnectionManager } from "./connection-manager.service";
import { DATABASE_CONFIG, DATA_SOURCE_OPTIONS } from "./database.constants";

/**
 * Database Module
 *
 * Resolves the connection settings once and shares a single
 * ConnectionManager with every record service. The connection itself is
 * opened on first use, so the API boots without a reachable database.
 */
@Global()
@Module({
  providers: [
    {
      provide: DATABASE_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): DatabaseConfig =>
        getDatabaseConfig((key) => configService.get<string>(key)),
    },
    {
      provide: DATA_SOURCE_OPTIONS,
      inject: [DATABASE_CONFIG],
      useFactory: buildDataSourceOptions,
    },
    ConnectionManager,
  ],
  exports: [DATABASE_CONFIG, ConnectionManager],
})
export class DatabaseModule {}
