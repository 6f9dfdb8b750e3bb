export const TYPES = {
  // Runtime
  Container: Symbol.for('Container'),
  Settings: Symbol.for('Settings'),
  Clock: Symbol.for('Clock'),
  EventBus: Symbol.for('EventBus'),
  // Core components
  Cache: Symbol.for('Cache'),
  ErrorPipeline: Symbol.for('ErrorPipeline'),
  OperationInstrumentation: Symbol.for('OperationInstrumentation'),
  // Collaborators
  TelemetryReporter: Symbol.for('TelemetryReporter'),
  MemorySampler: Symbol.for('MemorySampler'),
  // Background work
  MemoryMonitor: Symbol.for('MemoryMonitor'),
  BackgroundTaskManager: Symbol.for('BackgroundTaskManager'),
};
