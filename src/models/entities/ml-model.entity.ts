import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from "typeorm";
import { JsonObject } from "../../common/types/json.type";

/**
 * MLModel Entity
 *
 * Registered model metadata. The binary itself lives at artifactUri and is
 * never opened by this service.
 */
@Entity("models")
@Index(["name", "version"], { unique: true })
export class MLModel {
  @PrimaryGeneratedColumn({ name: "model_id" })
  id!: number;

  @Column({ type: "varchar", length: 255 })
  name!: string;

  @Column({ type: "varchar", length: 64 })
  version!: string; // e.g. "v2.1.0"

  @Column({ name: "model_type", type: "varchar", length: 64 })
  modelType!: string; // "classification", "regression", ...

  @Column({ name: "artifact_uri", type: "varchar", length: 1024 })
  artifactUri!: string;

  @Column({ name: "input_shape", type: "simple-json" })
  inputShape!: number[];

  @Column({ name: "output_shape", type: "simple-json" })
  outputShape!: number[];

  @Column({ type: "varchar", length: 32, default: "active" })
  status!: string;

  @Column({ type: "simple-json", nullable: true })
  metrics!: JsonObject | null;

  @Column({ type: "varchar", length: 64, nullable: true })
  sha256!: string | null;

  @CreateDateColumn({ name: "created_at" })
  createdAt!: Date;
}
