export * from './constants/index.js';
export * from './schemas/validation/analytics.validation.js';
export * from './utils/stats.utils.js';
