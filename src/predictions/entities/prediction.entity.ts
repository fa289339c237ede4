import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from "typeorm";
import { PredictionStatus } from "../types/prediction-status.type";
import { JsonObject } from "../../common/types/json.type";

/**
 * Prediction Entity
 *
 * A batch inference job processed outside this service. Status moves from
 * "queued" to "succeeded" or "failed" exactly once.
 */
@Entity("predictions")
@Index(["sessionId", "createdAt"])
export class Prediction {
  @PrimaryGeneratedColumn({ name: "prediction_id" })
  id!: number;

  @Column({
    name: "requestor_user_id",
    type: "varchar",
    length: 64,
    nullable: true,
  })
  requestorUserId!: string | null;

  @Column({ name: "session_id", type: "varchar", length: 64, nullable: true })
  sessionId!: string | null;

  @Column({ name: "model_id", type: "int", nullable: true })
  modelId!: number | null;

  @Column({ type: "varchar", length: 16, default: "queued" })
  status!: PredictionStatus;

  @Column({ type: "simple-json" })
  params!: JsonObject;

  @CreateDateColumn({ name: "created_at" })
  createdAt!: Date;

  @Column({ name: "completed_at", type: "datetime", nullable: true })
  completedAt!: Date | null;

  @Column({ name: "output_text", type: "text", nullable: true })
  outputText!: string | null;

  @Column({ type: "float", nullable: true })
  confidence!: number | null;

  @Column({ name: "latency_ms", type: "int", nullable: true })
  latencyMs!: number | null;

  @Column({ name: "error_message", type: "text", nullable: true })
  errorMessage!: string | null;
}
