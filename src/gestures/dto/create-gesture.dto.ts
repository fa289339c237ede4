import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsOptional, IsString, MaxLength, Min } from "class-validator";
import { Landmark } from "../entities/gesture.entity";
import {
  IsLandmarkList,
  LANDMARK_COUNT,
} from "../../common/validators/is-landmark-list.validator";

const EXAMPLE_LANDMARKS: Landmark[] = Array.from(
  { length: LANDMARK_COUNT },
  (_, i): Landmark => [0.5 + i * 0.01, 0.6 - i * 0.01],
);

export class CreateGestureDto {
  @ApiProperty({
    description: `Hand landmark coordinates, exactly ${LANDMARK_COUNT} [x, y] pairs`,
    type: "array",
    items: { type: "array", items: { type: "number" } },
    example: EXAMPLE_LANDMARKS,
  })
  @IsLandmarkList()
  landmarks!: Landmark[];

  @ApiProperty({ example: "user123", required: false })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  user_id?: string;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  session_id?: string;

  @ApiProperty({ example: 640, required: false })
  @IsOptional()
  @IsInt()
  @Min(1)
  frame_width?: number;

  @ApiProperty({ example: 480, required: false })
  @IsOptional()
  @IsInt()
  @Min(1)
  frame_height?: number;
}
