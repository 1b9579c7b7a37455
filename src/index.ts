export * from './types/record';
export * from './cleaning/text';
export * from './cleaning/dates';
export * from './cleaning/cleaner';
export * from './validation/reasons';
export * from './validation/rules';
export * from './validation/summary';
export * from './validation/validator';
export * from './report/qualityReport';
export * from './pipeline/runPipeline';
export * from './config/environment';
export * from './utils/errors';
export { logger } from './utils/logger';
export type { LogLevel } from './utils/logger';
