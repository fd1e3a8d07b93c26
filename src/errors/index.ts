export * from "./taxonomy.js";

export { ConfigurationError } from "../config/index.js";
