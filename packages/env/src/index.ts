export { getConfigDirectory, getDataDirectory, validateEnv, type ValidatedEnv } from './config.js';
export {
  SETTINGS_FILENAME,
  SettingsSchema,
  defaultSettings,
  loadSettings,
  parseSettings,
  type Settings,
} from './settings.js';
