import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import { Repository } from "typeorm";
import { Gesture, Landmark } from "./entities/gesture.entity";
import { ConnectionManager } from "../database/connection-manager.service";
import { RecordService } from "../database/record-service.interface";
import { readInsertedId, runStatement } from "../database/statement.util";
import { UnsupportedOperationError } from "../common/errors/storage.errors";
import { CLOCK, Clock, systemClock } from "../common/clock";

export interface CreateGestureFields {
  landmarks: Landmark[];
  sessionId?: string | null;
  userId?: string | null;
  frameWidth?: number | null;
  frameHeight?: number | null;
  source?: string;
}

export interface GestureInference {
  modelId: number;
  predictedLabel: string;
  confidence: number;
  probs?: Record<string, number> | null;
  processingTimeMs?: number | null;
}

export interface GestureQuery {
  userId?: string;
  limit?: number;
}

export const DEFAULT_GESTURE_SOURCE = "web";
export const DEFAULT_GESTURE_LIMIT = 100;

/**
 * GesturesService
 *
 * Landmark frames in the `gestures` table, plus the inference result an
 * external worker attaches afterwards.
 */
@Injectable()
export class GesturesService
  implements RecordService<CreateGestureFields, Gesture, GestureQuery>
{
  private readonly logger = new Logger(GesturesService.name);
  private readonly clock: Clock;

  constructor(
    private readonly connections: ConnectionManager,
    @Optional() @Inject(CLOCK) clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  /**
   * Store a frame. The landmark count has been checked by the request layer.
   */
  async create(fields: CreateGestureFields): Promise<number> {
    return runStatement(this.logger, "gestures.create", async () => {
      const repository = await this.repository();
      const result = await repository.insert({
        sessionId: fields.sessionId ?? null,
        userId: fields.userId ?? null,
        landmarks: fields.landmarks,
        frameWidth: fields.frameWidth ?? null,
        frameHeight: fields.frameHeight ?? null,
        source: fields.source ?? DEFAULT_GESTURE_SOURCE,
        receivedAt: this.clock(),
      });
      return readInsertedId(result.identifiers);
    });
  }

  /**
   * Write the inference result onto an existing frame.
   *
   * All inference columns are set together and processed_at comes from the
   * database clock.
   *
   * @returns false when no gesture has this id
   */
  async attachInference(
    gestureId: number,
    inference: GestureInference,
  ): Promise<boolean> {
    return runStatement(this.logger, "gestures.attachInference", async () => {
      const repository = await this.repository();
      const result = await repository.update(
        { id: gestureId },
        {
          modelId: inference.modelId,
          predictedLabel: inference.predictedLabel,
          confidence: inference.confidence,
          probs: inference.probs ?? null,
          processingTimeMs: inference.processingTimeMs ?? null,
          processedAt: () => "CURRENT_TIMESTAMP",
        },
      );
      return (result.affected ?? 0) > 0;
    });
  }

  /**
   * Newest frames first, optionally for one user, capped at `limit`.
   */
  async retrieve(query: GestureQuery = {}): Promise<Gesture[]> {
    return runStatement(this.logger, "gestures.retrieve", async () => {
      const repository = await this.repository();
      return repository.find({
        where: query.userId ? { userId: query.userId } : {},
        order: { receivedAt: "DESC", id: "DESC" },
        take: query.limit ?? DEFAULT_GESTURE_LIMIT,
      });
    });
  }

  async findOne(id: number): Promise<Gesture | null> {
    return runStatement(this.logger, "gestures.findOne", async () => {
      const repository = await this.repository();
      return repository.findOne({ where: { id } });
    });
  }

  async update(id: number): Promise<never> {
    throw new UnsupportedOperationError(
      `Updating gesture ${id} is not supported; only inference results can be attached`,
    );
  }

  async delete(id: number): Promise<boolean> {
    return runStatement(this.logger, "gestures.delete", async () => {
      const repository = await this.repository();
      const result = await repository.delete({ id });
      return (result.affected ?? 0) > 0;
    });
  }

  private repository(): Promise<Repository<Gesture>> {
    return this.connections.repository(Gesture);
  }
}
