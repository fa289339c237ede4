import { Logger } from "@nestjs/common";
import { QueryFailedError } from "typeorm";
import {
  ConnectionError,
  DuplicateRecordError,
  StorageError,
} from "../common/errors/storage.errors";

const DUPLICATE_KEY_CODES = new Set(["ER_DUP_ENTRY"]); // mysql2

// sql.js reports constraint failures by message only
const UNIQUE_CONSTRAINT_MESSAGE = "UNIQUE constraint failed";

export const getDriverErrorCode = (error: unknown): string | undefined => {
  if (!(error instanceof QueryFailedError)) {
    return undefined;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === "object" &&
    driverError !== null &&
    "code" in driverError &&
    typeof driverError.code === "string"
  ) {
    return driverError.code;
  }
  return undefined;
};

export const isDuplicateKeyError = (error: unknown): boolean => {
  const code = getDriverErrorCode(error);
  if (code !== undefined) {
    return DUPLICATE_KEY_CODES.has(code);
  }
  return (
    error instanceof QueryFailedError &&
    error.message.includes(UNIQUE_CONSTRAINT_MESSAGE)
  );
};

/**
 * Runs one statement and translates driver failures into StorageError.
 *
 * ConnectionError is already logged by the ConnectionManager and passes
 * through untouched. Nothing is retried.
 */
export async function runStatement<T>(
  logger: Logger,
  operation: string,
  statement: () => Promise<T>,
): Promise<T> {
  try {
    return await statement();
  } catch (error) {
    if (error instanceof ConnectionError || error instanceof StorageError) {
      throw error;
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(
      `[${operation}] ${errorMessage}`,
      error instanceof Error ? error.stack : undefined,
    );

    if (isDuplicateKeyError(error)) {
      throw new DuplicateRecordError(operation, errorMessage, { cause: error });
    }
    throw new StorageError(operation, errorMessage, { cause: error });
  }
}

/**
 * Pull the generated primary key out of an InsertResult.
 */
export const readInsertedId = (
  identifiers: Record<string, unknown>[],
): number => {
  const id = identifiers[0]?.id;
  if (typeof id !== "number") {
    throw new Error(`Insert did not return a numeric id (got ${String(id)})`);
  }
  return id;
};
