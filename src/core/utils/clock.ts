/**
 * Source of the current time; injected so expiry logic can be tested
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
