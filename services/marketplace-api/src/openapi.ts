const ontologyIdParameter = {
  in: "path",
  name: "ontologyId",
  required: true,
  schema: { type: "string" },
};

const authResponses = {
  "401": { description: "Missing or invalid bearer token" },
  "403": { description: "Origin not allowed" },
  "503": { description: "Signing keys unavailable" },
};

export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Ontology Marketplace API",
      version: "0.1.0",
      description:
        "Search, publish and curate ontologies. Every route except /health and /openapi.json requires a bearer ID token.",
    },
    servers: [{ url: serviceBaseUrl }],
    components: {
      securitySchemes: {
        bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
      },
    },
    security: [{ bearerAuth: [] }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          security: [],
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/search_ontologies": {
        get: {
          summary: "Search public ontologies and the caller's own",
          parameters: [
            { in: "query", name: "search_term", schema: { type: "string" } },
            { in: "query", name: "limit", schema: { type: "integer", minimum: 1, maximum: 100, default: 100 } },
            { in: "query", name: "offset", schema: { type: "integer", minimum: 0, default: 0 } },
          ],
          responses: {
            "200": { description: "Matching ontologies, newest first" },
            "400": { description: "Invalid query" },
            ...authResponses,
          },
        },
      },
      "/add_ontologies": {
        post: {
          summary: "Add ontologies owned by the caller; known source URLs are skipped",
          responses: {
            "201": { description: "Ontologies created" },
            "400": { description: "Invalid request" },
            ...authResponses,
          },
        },
      },
      "/delete_ontologies": {
        delete: {
          summary: "Delete ontologies owned by the caller",
          responses: {
            "200": { description: "Ontologies deleted" },
            "400": { description: "Invalid request" },
            "404": { description: "No owned ontology matched" },
            ...authResponses,
          },
        },
      },
      "/update_ontology/{ontologyId}": {
        put: {
          summary: "Update an ontology owned by the caller",
          parameters: [ontologyIdParameter],
          responses: {
            "200": { description: "Ontology updated" },
            "400": { description: "Invalid request" },
            "404": { description: "Ontology not found" },
            "409": { description: "sourceUrl already in use" },
            ...authResponses,
            "403": { description: "Origin not allowed, or caller is not the owner" },
          },
        },
      },
      "/like_ontology/{ontologyId}": {
        post: {
          summary: "Like an ontology (once per caller)",
          parameters: [ontologyIdParameter],
          responses: {
            "200": { description: "Like recorded" },
            "404": { description: "Ontology not found" },
            ...authResponses,
          },
        },
      },
      "/tags": {
        get: {
          summary: "List tags",
          responses: {
            "200": { description: "All tags, lowercase and sorted" },
            ...authResponses,
          },
        },
        post: {
          summary: "Add tags",
          responses: {
            "200": { description: "All tags after the addition" },
            "400": { description: "Invalid request" },
            ...authResponses,
          },
        },
      },
      "/permissions/{ontologyId}": {
        get: {
          summary: "What the caller may do with an ontology",
          parameters: [ontologyIdParameter],
          responses: {
            "200": { description: "Permissions resolved" },
            "404": { description: "Ontology not found" },
            ...authResponses,
          },
        },
      },
    },
  };
}
