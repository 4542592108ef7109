export * from "./schemas.js";
export * from "./openapi.js";
