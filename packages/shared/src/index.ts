export * from "./validation.js";
export * from "./ontology-input.js";
export * from "./crypto/fingerprint.js";
export * from "./auth/identity.js";
export * from "./auth/config.js";
export * from "./auth/logger.js";
export * from "./auth/signing-keys.js";
export * from "./auth/token-verifier.js";
export * from "./auth/dev-bypass.js";
export * from "./auth/boundary.js";
export * from "./auth/cors.js";
export * from "./http/headers.js";
export * from "./http/params.js";
export * from "./http/endpoint-guard.js";
export * from "./http/serverless.js";
export * from "./types/ontology.js";
export * from "./types/api.js";
