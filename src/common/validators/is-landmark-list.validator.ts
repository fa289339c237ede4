import { registerDecorator, ValidationOptions } from "class-validator";

export const LANDMARK_COUNT = 21;

const isCoordinatePair = (point: unknown): boolean =>
  Array.isArray(point) &&
  point.length === 2 &&
  point.every((value) => typeof value === "number" && Number.isFinite(value));

/**
 * Accepts an array of exactly `points` `[x, y]` pairs of finite numbers.
 */
export function IsLandmarkList(
  points: number = LANDMARK_COUNT,
  validationOptions?: ValidationOptions,
) {
  return function (object: object, propertyName: string): void {
    registerDecorator({
      name: "isLandmarkList",
      target: object.constructor,
      propertyName,
      constraints: [points],
      options: {
        message: `$property must contain exactly ${points} [x, y] points`,
        ...validationOptions,
      },
      validator: {
        validate(value: unknown): boolean {
          return (
            Array.isArray(value) &&
            value.length === points &&
            value.every(isCoordinatePair)
          );
        },
      },
    });
  };
}
