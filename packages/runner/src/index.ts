export { loadRuntimeConfig, readConfigFile } from "./config";
export type { LoadConfigOptions } from "./config";
export { Runtime } from "./Runtime";
export type { RuntimeOptions } from "./Runtime";
export { demoScript } from "./demo";
export * from "./sinks";
