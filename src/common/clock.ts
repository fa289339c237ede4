/** Injection token for the service-side clock used to stamp capture times. */
export const CLOCK = "CLOCK";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
