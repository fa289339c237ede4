import { Entity, PrimaryGeneratedColumn, Column, Index } from "typeorm";

export type Landmark = [number, number];

/**
 * Gesture Entity
 *
 * One captured frame of hand landmarks. The inference columns stay NULL
 * until attachInference fills modelId, predictedLabel, confidence and
 * processedAt in a single statement.
 */
@Entity("gestures")
@Index(["userId", "receivedAt"])
export class Gesture {
  @PrimaryGeneratedColumn({ name: "gesture_id" })
  id!: number;

  @Column({ name: "session_id", type: "varchar", length: 64, nullable: true })
  sessionId!: string | null;

  @Column({ name: "user_id", type: "varchar", length: 64, nullable: true })
  userId!: string | null;

  @Column({ type: "simple-json" })
  landmarks!: Landmark[];

  @Column({ name: "frame_width", type: "int", nullable: true })
  frameWidth!: number | null;

  @Column({ name: "frame_height", type: "int", nullable: true })
  frameHeight!: number | null;

  @Column({ type: "varchar", length: 32, default: "web" })
  source!: string; // "web", "api", ...

  @Column({ name: "received_at", type: "datetime" })
  receivedAt!: Date;

  // Inference result
  @Column({ name: "model_id", type: "int", nullable: true })
  modelId!: number | null;

  @Column({
    name: "predicted_label",
    type: "varchar",
    length: 64,
    nullable: true,
  })
  predictedLabel!: string | null;

  @Column({ type: "float", nullable: true })
  confidence!: number | null; // 0.0 - 1.0

  @Column({ type: "simple-json", nullable: true })
  probs!: Record<string, number> | null; // label -> probability

  @Column({ name: "processing_time_ms", type: "int", nullable: true })
  processingTimeMs!: number | null;

  @Column({ name: "processed_at", type: "datetime", nullable: true })
  processedAt!: Date | null;
}
