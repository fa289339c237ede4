import { Injectable, Logger } from "@nestjs/common";
import { Repository } from "typeorm";
import { Prediction } from "./entities/prediction.entity";
import { INITIAL_PREDICTION_STATUS } from "./types/prediction-status.type";
import { ConnectionManager } from "../database/connection-manager.service";
import { RecordService } from "../database/record-service.interface";
import { readInsertedId, runStatement } from "../database/statement.util";
import {
  UnsupportedOperationError,
  ValidationError,
} from "../common/errors/storage.errors";
import { JsonObject } from "../common/types/json.type";

export interface CreatePredictionFields {
  requestorUserId?: string | null;
  sessionId?: string | null;
  modelId?: number | null;
  params?: JsonObject;
}

export interface PredictionCompletion {
  outputText?: string | null;
  confidence?: number | null;
  latencyMs?: number | null;
  errorMessage?: string | null;
}

export interface PredictionQuery {
  sessionId?: string;
  limit?: number;
}

export const DEFAULT_PREDICTION_LIMIT = 100;

/**
 * PredictionsService
 *
 * Batch prediction jobs in the `predictions` table. Workers outside this
 * service pick up queued rows and report back through markComplete.
 */
@Injectable()
export class PredictionsService
  implements RecordService<CreatePredictionFields, Prediction, PredictionQuery>
{
  private readonly logger = new Logger(PredictionsService.name);

  constructor(private readonly connections: ConnectionManager) {}

  /**
   * Queue a job. created_at comes from the database clock.
   */
  async create(fields: CreatePredictionFields): Promise<number> {
    return runStatement(this.logger, "predictions.create", async () => {
      const repository = await this.repository();
      const result = await repository.insert({
        requestorUserId: fields.requestorUserId ?? null,
        sessionId: fields.sessionId ?? null,
        modelId: fields.modelId ?? null,
        status: INITIAL_PREDICTION_STATUS,
        params: fields.params ?? {},
      });
      return readInsertedId(result.identifiers);
    });
  }

  /**
   * Move a queued job to its terminal state.
   *
   * A non-empty errorMessage marks the job failed and leaves the output
   * columns alone; otherwise it succeeds with outputText, confidence and
   * latencyMs. Only rows still queued are matched, so the first completion
   * wins and later calls return false.
   *
   * @returns true when the row transitioned
   * @throws ValidationError when neither outputText nor errorMessage is set
   */
  async markComplete(
    id: number,
    completion: PredictionCompletion,
  ): Promise<boolean> {
    if (!completion.errorMessage && !completion.outputText) {
      throw new ValidationError(
        "output_text is required unless error_message is given",
      );
    }

    return runStatement(this.logger, "predictions.markComplete", async () => {
      const repository = await this.repository();
      const where = { id, status: INITIAL_PREDICTION_STATUS };

      const result = completion.errorMessage
        ? await repository.update(where, {
            status: "failed",
            errorMessage: completion.errorMessage,
            completedAt: () => "CURRENT_TIMESTAMP",
          })
        : await repository.update(where, {
            status: "succeeded",
            outputText: completion.outputText,
            confidence: completion.confidence ?? null,
            latencyMs: completion.latencyMs ?? null,
            completedAt: () => "CURRENT_TIMESTAMP",
          });

      return (result.affected ?? 0) > 0;
    });
  }

  /**
   * Newest jobs first, optionally for one session, capped at `limit`.
   */
  async retrieve(query: PredictionQuery = {}): Promise<Prediction[]> {
    return runStatement(this.logger, "predictions.retrieve", async () => {
      const repository = await this.repository();
      return repository.find({
        where: query.sessionId ? { sessionId: query.sessionId } : {},
        order: { createdAt: "DESC", id: "DESC" },
        take: query.limit ?? DEFAULT_PREDICTION_LIMIT,
      });
    });
  }

  async findOne(id: number): Promise<Prediction | null> {
    return runStatement(this.logger, "predictions.findOne", async () => {
      const repository = await this.repository();
      return repository.findOne({ where: { id } });
    });
  }

  async update(id: number): Promise<never> {
    throw new UnsupportedOperationError(
      `Updating prediction ${id} is not supported; use completion fields to finish it`,
    );
  }

  async delete(id: number): Promise<boolean> {
    return runStatement(this.logger, "predictions.delete", async () => {
      const repository = await this.repository();
      const result = await repository.delete({ id });
      return (result.affected ?? 0) > 0;
    });
  }

  private repository(): Promise<Repository<Prediction>> {
    return this.connections.repository(Prediction);
  }
}
