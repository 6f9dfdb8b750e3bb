export { ServiceCore, type ServiceConstructor, type ServiceCoreOptions, type ServiceCoreStatus } from './ServiceCore';
export { SettingsInitializer, SettingsValidationError } from './initialization';
