export * from "./plugin.js";
export * from "./entities/element.js";
