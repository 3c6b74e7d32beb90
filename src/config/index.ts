export {
  DEFAULT_GUI_TYPE,
  GENERIC_GUI_ALIAS,
  GUI_FIELD,
  SERVER_FIELDS,
  defaultGuiDescriptor,
  type GuiDescriptor,
  type ServerFieldDefaults,
} from './defaults.js';
export { ConfigError, ConfigFormatError, ConfigNotFoundError, NullFieldError } from './errors.js';
export {
  loadConfig,
  splitConfig,
  writeResidualConfig,
  type InstrumentSettings,
  type LoadedConfig,
  type SplitConfig,
  type SplitConfigOptions,
} from './splitConfig.js';
