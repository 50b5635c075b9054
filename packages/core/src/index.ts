// Re-export everything from submodules
export * from "./cleanup.js";
export * from "./config.js";
export * from "./id-generator.js";
export * from "./utils.js";

// Re-export env-loader (note: importing this module has side effects)
export { envLoadInfo } from "./env-loader.js";
