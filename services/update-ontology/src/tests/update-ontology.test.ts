import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { SqliteOntologyStore } from "@ontology-marketplace/catalog-store";
import type { AuthConfig, UpdateOntologyResponse } from "@ontology-marketplace/shared";
import {
  bearer,
  createTestAuthContext,
  createTestIssuer,
  TEST_EMAIL,
  type TestIssuer,
} from "@ontology-marketplace/shared/testing";
import { buildServer } from "../server.js";

async function setup(issuer: TestIssuer, authOverrides: Partial<AuthConfig> = {}) {
  const dir = mkdtempSync(join(tmpdir(), "update-ontology-"));
  const store = new SqliteOntologyStore(join(dir, "catalog.db"));
  const [own] = store.addOntologies(
    [{ name: "Wine", sourceUrl: "https://ontologies.example/wine.ttl", isPublic: false }],
    TEST_EMAIL,
  ).created;
  const [other] = store.addOntologies(
    [{ name: "Pizza", sourceUrl: "https://ontologies.example/pizza.ttl", isPublic: true }],
    "alice@example.com",
  ).created;
  const app = await buildServer({ store, auth: createTestAuthContext(issuer, authOverrides) });
  return {
    app,
    store,
    own,
    other,
    async cleanup() {
      await app.close();
      store.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

test("the owner updates fields and tags", async () => {
  const issuer = await createTestIssuer();
  const { app, store, own, cleanup } = await setup(issuer);
  try {
    const res = await app.inject({
      method: "PUT",
      url: `/update_ontology/${own.uuid}`,
      headers: { authorization: bearer(await issuer.sign()) },
      payload: { description: "Grapes", isPublic: true, tags: ["Drinks", " drinks "] },
    });
    assert.equal(res.statusCode, 200);
    const { ontology } = res.json() as UpdateOntologyResponse;
    assert.equal(ontology.uuid, own.uuid);
    assert.equal(ontology.name, "Wine");
    assert.equal(ontology.description, "Grapes");
    assert.equal(ontology.isPublic, true);
    assert.deepEqual(ontology.tags, ["drinks"]);
    assert.deepEqual(store.listTags(), ["drinks"]);
  } finally {
    await cleanup();
  }
});

test("someone else cannot update the ontology", async () => {
  const issuer = await createTestIssuer();
  const { app, store, other, cleanup } = await setup(issuer);
  try {
    const res = await app.inject({
      method: "PUT",
      url: `/update_ontology/${other.uuid}`,
      headers: { authorization: bearer(await issuer.sign()) },
      payload: { name: "Hijacked" },
    });
    assert.equal(res.statusCode, 403);
    assert.equal(res.json().error, "forbidden");
    assert.equal(store.getOntology(other.uuid)?.name, "Pizza");
  } finally {
    await cleanup();
  }
});

test("a token carrying the owner's unverified email is refused", async () => {
  const issuer = await createTestIssuer();
  const { app, store, own, cleanup } = await setup(issuer);
  try {
    const token = await issuer.sign({ subject: "other-uid", email: TEST_EMAIL, emailVerified: false });
    const res = await app.inject({
      method: "PUT",
      url: `/update_ontology/${own.uuid}`,
      headers: { authorization: bearer(token) },
      payload: { name: "Taken" },
    });
    assert.equal(res.statusCode, 401);
    assert.equal(res.json().reason, "unverified-email");
    assert.equal(store.getOntology(own.uuid)?.name, "Wine");
  } finally {
    await cleanup();
  }
});

test("without the verified email requirement an unverified email does not confer ownership", async () => {
  const issuer = await createTestIssuer();
  const { app, store, own, cleanup } = await setup(issuer, { requireVerifiedEmail: false });
  try {
    const token = await issuer.sign({ subject: "other-uid", email: TEST_EMAIL, emailVerified: false });
    const res = await app.inject({
      method: "PUT",
      url: `/update_ontology/${own.uuid}`,
      headers: { authorization: bearer(token) },
      payload: { name: "Taken" },
    });
    assert.equal(res.statusCode, 403);
    assert.equal(res.json().error, "forbidden");
    assert.equal(store.getOntology(own.uuid)?.name, "Wine");
  } finally {
    await cleanup();
  }
});

test("answers 404 for unknown ids and 400 for invalid fields", async () => {
  const issuer = await createTestIssuer();
  const { app, own, cleanup } = await setup(issuer);
  const authorization = bearer(await issuer.sign());
  try {
    const missing = await app.inject({
      method: "PUT",
      url: "/update_ontology/unknown-id",
      headers: { authorization },
      payload: { name: "Anything" },
    });
    assert.equal(missing.statusCode, 404);
    assert.equal(missing.json().error, "ontology_not_found");

    const invalid = await app.inject({
      method: "PUT",
      url: `/update_ontology/${own.uuid}`,
      headers: { authorization },
      payload: { nodeCount: "many" },
    });
    assert.equal(invalid.statusCode, 400);
    assert.equal(invalid.json().error, "invalid_request");
  } finally {
    await cleanup();
  }
});

test("refuses a sourceUrl that belongs to another ontology", async () => {
  const issuer = await createTestIssuer();
  const { app, own, cleanup } = await setup(issuer);
  try {
    const res = await app.inject({
      method: "PUT",
      url: `/update_ontology/${own.uuid}`,
      headers: { authorization: bearer(await issuer.sign()) },
      payload: { sourceUrl: "https://ontologies.example/pizza.ttl" },
    });
    assert.equal(res.statusCode, 409);
    assert.equal(res.json().error, "source_url_conflict");
  } finally {
    await cleanup();
  }
});

test("a dev bypass identity acts as its email when the bypass is on", async () => {
  const issuer = await createTestIssuer();
  const dir = mkdtempSync(join(tmpdir(), "update-ontology-"));
  const store = new SqliteOntologyStore(join(dir, "catalog.db"));
  const [own] = store.addOntologies(
    [{ name: "Wine", sourceUrl: "https://ontologies.example/wine.ttl", isPublic: false }],
    "dev@example.com",
  ).created;
  const app = await buildServer({
    store,
    auth: createTestAuthContext(issuer, { bypassEnabled: true, bypassDefaultEmail: "dev@example.com" }),
  });
  try {
    const res = await app.inject({
      method: "PUT",
      url: `/update_ontology/${own.uuid}`,
      payload: { name: "Wine (local)" },
    });
    assert.equal(res.statusCode, 200);
    assert.equal((res.json() as UpdateOntologyResponse).ontology.name, "Wine (local)");
  } finally {
    await app.close();
    store.close();
    rmSync(dir, { recursive: true, force: true });
  }
});
