export { getEnv, resetEnv, type Env } from './env';
export { DEFAULT_TIMINGS, IMMEDIATE_TIMINGS, resolveTimings, sleep, type Timings } from './timing';
export { BatchRequestSchema, parseBatchRequest, type BatchRequest, type BatchRequestInput } from './request';
