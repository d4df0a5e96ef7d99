export * from './types';
export * from './config';
export * from './errors';
export * from './envelope';
export * from './classifier';
export * from './rateLimitHeaders';
export * from './logger';
export * from './runtime';
export * from './pipeline';
export * from './HttpClient';
export * from './interceptors';
export * from './factories';
export { createFetchTransport, fetchTransport, type FetchFn } from './transport/fetchTransport';
export { computeBackoffDelay } from './stages/retry';
export { AttemptTimeoutError } from './stages/attemptTimeout';
export type { ResilienceStage, StageContext, StageHandler } from './stages/stage';
