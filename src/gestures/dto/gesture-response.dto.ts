import { ApiProperty } from "@nestjs/swagger";
import { Gesture, Landmark } from "../entities/gesture.entity";

export class GestureResponseDto {
  @ApiProperty()
  gesture_id!: number;

  @ApiProperty({ type: String, nullable: true })
  session_id!: string | null;

  @ApiProperty({ type: String, nullable: true })
  user_id!: string | null;

  @ApiProperty({
    type: "array",
    items: { type: "array", items: { type: "number" } },
  })
  landmarks!: Landmark[];

  @ApiProperty({ type: Number, nullable: true })
  frame_width!: number | null;

  @ApiProperty({ type: Number, nullable: true })
  frame_height!: number | null;

  @ApiProperty({ example: "web" })
  source!: string;

  @ApiProperty({ description: "ISO 8601" })
  received_at!: string;

  @ApiProperty({ type: Number, nullable: true })
  model_id!: number | null;

  @ApiProperty({ type: String, nullable: true })
  predicted_label!: string | null;

  @ApiProperty({ type: Number, nullable: true })
  confidence!: number | null;

  @ApiProperty({ type: Object, nullable: true })
  probs!: Record<string, number> | null;

  @ApiProperty({ type: Number, nullable: true })
  processing_time_ms!: number | null;

  @ApiProperty({ type: String, nullable: true, description: "ISO 8601" })
  processed_at!: string | null;

  static fromEntity(gesture: Gesture): GestureResponseDto {
    const dto = new GestureResponseDto();
    dto.gesture_id = gesture.id;
    dto.session_id = gesture.sessionId;
    dto.user_id = gesture.userId;
    dto.landmarks = gesture.landmarks;
    dto.frame_width = gesture.frameWidth;
    dto.frame_height = gesture.frameHeight;
    dto.source = gesture.source;
    dto.received_at = gesture.receivedAt.toISOString();
    dto.model_id = gesture.modelId;
    dto.predicted_label = gesture.predictedLabel;
    dto.confidence = gesture.confidence;
    dto.probs = gesture.probs;
    dto.processing_time_ms = gesture.processingTimeMs;
    dto.processed_at = gesture.processedAt?.toISOString() ?? null;
    return dto;
  }
}

export class GestureCreatedDto {
  @ApiProperty({ example: 1 })
  gesture_id!: number;
}
