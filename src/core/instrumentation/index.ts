export { OperationInstrumentation } from './OperationInstrumentation';
export type { OperationStats, PerformanceStats } from './types';
