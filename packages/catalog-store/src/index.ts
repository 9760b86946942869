export * from "./ontology-store.js";
