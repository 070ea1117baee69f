export { loadConfig, getDefaultConfig, getConfigPath, DEFAULT_CONFIG_PATH } from './loader.js';
export {
  ConfigSchema,
  ApplyModeSchema,
  RegistrySettingsSchema,
  LayoutSettingsSchema,
  ProjectSettingsSchema,
} from './schema.js';
export type { Config, ApplyMode, RegistrySettings, LayoutSettings, ProjectSettings } from './schema.js';
