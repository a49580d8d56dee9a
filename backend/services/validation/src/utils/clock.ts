// backend/services/validation/src/utils/clock.ts
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
