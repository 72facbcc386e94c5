export * from "./config/index.js";
export * from "./launcher/index.js";
