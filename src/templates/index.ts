// README and index page templates
export * from "./readme/index.js";
