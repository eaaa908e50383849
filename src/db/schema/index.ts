export * from "./content.js";
export * from "./profiles.js";
export * from "./role-applications.js";
export * from "./subscriptions.js";
export * from "./tokens.js";
export * from "./users.js";
