import { ApiProperty } from "@nestjs/swagger";
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from "class-validator";

/**
 * PUT /predictions/:id body
 *
 * Completion report from the worker. A non-empty error_message marks the job
 * failed; otherwise output_text is required and the job succeeds.
 */
export class UpdatePredictionDto {
  @ApiProperty({ required: false, example: "HELLO" })
  @IsOptional()
  @IsString()
  output_text?: string;

  @ApiProperty({ required: false, minimum: 0, maximum: 1, example: 0.91 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  confidence?: number;

  @ApiProperty({ required: false, example: 120 })
  @IsOptional()
  @IsInt()
  @Min(0)
  latency_ms?: number;

  @ApiProperty({ required: false, example: "model artifact missing" })
  @IsOptional()
  @IsString()
  error_message?: string;
}
