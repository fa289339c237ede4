import { DataSourceOptions } from "typeorm";
import { DatabaseConfig } from "./database.config";
import { MLModel } from "../models/entities/ml-model.entity";
import { Gesture } from "../gestures/entities/gesture.entity";
import { Prediction } from "../predictions/entities/prediction.entity";

export const ENTITIES = [MLModel, Gesture, Prediction];

/**
 * MySQL data source options.
 *
 * A single pooled connection with autocommit: every repository call is one
 * statement and there is no transaction demarcation.
 */
export const buildDataSourceOptions = (
  dbConfig: DatabaseConfig,
): DataSourceOptions => ({
  type: "mysql",
  host: dbConfig.host,
  port: dbConfig.port,
  username: dbConfig.user,
  password: dbConfig.password,
  database: dbConfig.database,
  entities: ENTITIES,
  synchronize: dbConfig.synchronize, // Auto-sync schema (dev only!)
  logging: dbConfig.logging,
  timezone: "Z", // Always use UTC
  connectTimeout: dbConfig.connectTimeoutMs,
  poolSize: 1,
});
