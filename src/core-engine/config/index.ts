export {CONFIG_FILENAMES, ConfigLoader, DEFAULT_SETTINGS, deepMerge} from "./config-loader";
export type {LoadedConfig, LoadOptions} from "./config-loader";
export {parseOverrides, resolveParameters, substituteParameters} from "./parameters";
export type {ParameterValue} from "./parameters";
export * from "./pipeline-schema";
