export const PREDICTION_STATUSES = ["queued", "succeeded", "failed"] as const;

export type PredictionStatus = (typeof PREDICTION_STATUSES)[number];

export const INITIAL_PREDICTION_STATUS: PredictionStatus = "queued";

