export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export {
  PropertiesFileSource,
  type PropertiesFileSourceOptions,
} from "./adapters/properties/properties-file-source"
export {
  BUILD_INFO_FILE,
  type BuildInfo,
  type LoadBuildInfoOptions,
  loadBuildInfo,
  NOT_DEFINED,
} from "./core/build-info"
export {
  defaultConfigLocation,
  parseConfigLocation,
  RESOURCES_LOCATION,
} from "./core/config-location"
export { definePropertyKeys } from "./core/define-property-keys"
export { maskSecured } from "./core/env-config"
export {
  APP_FILE_SUFFIX,
  createEnvConfigLoader,
  type EnvConfigLoaderOptions,
  GLOBAL_FILE_SUFFIX,
  TEST_FILE_SUFFIX,
} from "./core/env-config-loader"
export { ConfigDefinitionError, ConfigResourceError, ConfigValueParseError } from "./core/errors"
export type { EnvConfig } from "./ports/env-config"
export type { EnvConfigLoader } from "./ports/env-config-loader"
export type { ConfigLocation } from "./ports/location"
export type { PropertyKey, PropertyKeySet, PropertyVisibility } from "./ports/property-key"
export type { ConfigSource } from "./ports/source"
export type { PropertyValueProcessor } from "./ports/value-processor"
