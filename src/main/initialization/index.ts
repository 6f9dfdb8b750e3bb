export { SettingsInitializer, SettingsValidationError } from './settings-initializer';
