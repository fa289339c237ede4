import { ApiProperty } from "@nestjs/swagger";
import { Prediction } from "../entities/prediction.entity";
import {
  PREDICTION_STATUSES,
  PredictionStatus,
} from "../types/prediction-status.type";
import { JsonObject } from "../../common/types/json.type";

export class PredictionResponseDto {
  @ApiProperty()
  prediction_id!: number;

  @ApiProperty({ type: String, nullable: true })
  requestor_user_id!: string | null;

  @ApiProperty({ type: String, nullable: true })
  session_id!: string | null;

  @ApiProperty({ type: Number, nullable: true })
  model_id!: number | null;

  @ApiProperty({ enum: PREDICTION_STATUSES })
  status!: PredictionStatus;

  @ApiProperty({ type: Object })
  params!: JsonObject;

  @ApiProperty({ description: "ISO 8601" })
  created_at!: string;

  @ApiProperty({ type: String, nullable: true, description: "ISO 8601" })
  completed_at!: string | null;

  @ApiProperty({ type: String, nullable: true })
  output_text!: string | null;

  @ApiProperty({ type: Number, nullable: true })
  confidence!: number | null;

  @ApiProperty({ type: Number, nullable: true })
  latency_ms!: number | null;

  @ApiProperty({ type: String, nullable: true })
  error_message!: string | null;

  static fromEntity(prediction: Prediction): PredictionResponseDto {
    const dto = new PredictionResponseDto();
    dto.prediction_id = prediction.id;
    dto.requestor_user_id = prediction.requestorUserId;
    dto.session_id = prediction.sessionId;
    dto.model_id = prediction.modelId;
    dto.status = prediction.status;
    dto.params = prediction.params;
    dto.created_at = prediction.createdAt.toISOString();
    dto.completed_at = prediction.completedAt?.toISOString() ?? null;
    dto.output_text = prediction.outputText;
    dto.confidence = prediction.confidence;
    dto.latency_ms = prediction.latencyMs;
    dto.error_message = prediction.errorMessage;
    return dto;
  }
}

export class PredictionCreatedDto {
  @ApiProperty({ example: 1 })
  prediction_id!: number;

  @ApiProperty({ enum: PREDICTION_STATUSES, example: "queued" })
  status!: PredictionStatus;
}
