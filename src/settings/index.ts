/**
 * Settings Module
 */

export {
  type TutorSettings,
  type PartialTutorSettings,
  type StorageSettings,
  type ComplexitySettings,
  type ReviewSettings,
  type AdvancedSettings,
  DEFAULT_SETTINGS,
  validateSettings,
  migrateSettings,
  loadSettingsFromEnv,
} from './settings';
