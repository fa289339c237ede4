import { ApiProperty } from "@nestjs/swagger";
import {
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from "class-validator";
import { Landmark } from "../entities/gesture.entity";
import { IsLandmarkList } from "../../common/validators/is-landmark-list.validator";

/**
 * PUT /gestures/:id body
 *
 * Only the inference fields can be written. `landmarks` is accepted by the
 * schema so that the request is answered with 501 rather than 400.
 */
export class UpdateGestureDto {
  @ApiProperty({ required: false, example: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  model_id?: number;

  @ApiProperty({ required: false, example: "A" })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  predicted_label?: string;

  @ApiProperty({ required: false, minimum: 0, maximum: 1, example: 0.95 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  confidence?: number;

  @ApiProperty({
    required: false,
    description: "Label to probability",
    example: { A: 0.95, B: 0.05 },
  })
  @IsOptional()
  @IsObject()
  probs?: Record<string, number>;

  @ApiProperty({ required: false, example: 15 })
  @IsOptional()
  @IsInt()
  @Min(0)
  processing_time_ms?: number;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsLandmarkList()
  landmarks?: Landmark[];
}
