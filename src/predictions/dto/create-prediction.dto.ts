import { ApiProperty } from "@nestjs/swagger";
import {
  IsIn,
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from "class-validator";
import { INITIAL_PREDICTION_STATUS } from "../types/prediction-status.type";
import { JsonObject } from "../../common/types/json.type";

export class CreatePredictionDto {
  @ApiProperty({ required: false, example: "user123" })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  requestor_user_id?: string;

  @ApiProperty({ required: false, example: "session-42" })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  session_id?: string;

  @ApiProperty({ required: false, example: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  model_id?: number;

  @ApiProperty({
    required: false,
    enum: [INITIAL_PREDICTION_STATUS],
    description: "New jobs always start queued",
  })
  @IsOptional()
  @IsIn([INITIAL_PREDICTION_STATUS])
  status?: string;

  @ApiProperty({
    required: false,
    description: "Opaque job parameters",
    example: { batch_name: "Daily ASL Recognition Batch" },
  })
  @IsOptional()
  @IsObject()
  params?: JsonObject;
}
