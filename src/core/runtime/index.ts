export { systemClock, type Clock } from './clock';
export { ServiceEvents, type ServiceCoreEvents, type MemoryPressureLevel } from './service-events';
export { Component } from './component';
