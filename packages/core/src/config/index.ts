export {
  DEFAULT_TEMPERATURE,
  PROVIDERS,
  SETTING_KEYS,
  SettingsCache,
  isProviderName,
  isSettingKey,
  resolveSettings,
  validateProviderSettings,
} from './settings.js';
export type {
  AssistantSettings,
  ProviderName,
  SettingKey,
  SettingsCacheOptions,
  StoredSettings,
} from './settings.js';
export { guardConfigSchema, loadGuardConfig, parseGuardConfig } from './guard-config.js';
export type { GuardConfigOverrides } from './guard-config.js';
export { loadStaticGrants, staticGrantsSchema } from './grants.js';
