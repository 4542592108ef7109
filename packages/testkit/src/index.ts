export * from "./clock.js";
export * from "./http.js";
