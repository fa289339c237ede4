import { ApiProperty } from "@nestjs/swagger";
import { MLModel } from "../entities/ml-model.entity";
import { JsonObject } from "../../common/types/json.type";

export class ModelResponseDto {
  @ApiProperty()
  model_id!: number;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  version!: string;

  @ApiProperty()
  model_type!: string;

  @ApiProperty()
  artifact_uri!: string;

  @ApiProperty({ type: [Number] })
  input_shape!: number[];

  @ApiProperty({ type: [Number] })
  output_shape!: number[];

  @ApiProperty({ example: "active" })
  status!: string;

  @ApiProperty({ type: Object, nullable: true })
  metrics!: JsonObject | null;

  @ApiProperty({ type: String, nullable: true })
  sha256!: string | null;

  @ApiProperty({ description: "ISO 8601" })
  created_at!: string;

  static fromEntity(model: MLModel): ModelResponseDto {
    const dto = new ModelResponseDto();
    dto.model_id = model.id;
    dto.name = model.name;
    dto.version = model.version;
    dto.model_type = model.modelType;
    dto.artifact_uri = model.artifactUri;
    dto.input_shape = model.inputShape;
    dto.output_shape = model.outputShape;
    dto.status = model.status;
    dto.metrics = model.metrics;
    dto.sha256 = model.sha256;
    dto.created_at = model.createdAt.toISOString();
    return dto;
  }
}

export class ModelCreatedDto {
  @ApiProperty({ example: 1 })
  model_id!: number;
}
