export { Bus } from './Bus';
export type { BusOptions, BusRequestOptions, RespondOptions, ResponderRegistration } from './Bus';
