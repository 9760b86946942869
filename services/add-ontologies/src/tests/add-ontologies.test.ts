import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { SqliteOntologyStore } from "@ontology-marketplace/catalog-store";
import type { AddOntologiesResponse } from "@ontology-marketplace/shared";
import {
  bearer,
  createTestAuthContext,
  createTestIssuer,
  TEST_EMAIL,
  TEST_SUBJECT,
} from "@ontology-marketplace/shared/testing";
import { buildServer, parseAddOntologiesRequest } from "../server.js";

function createTempDbPath() {
  const dir = mkdtempSync(join(tmpdir(), "add-ontologies-"));
  return {
    dir,
    dbPath: join(dir, "catalog.db"),
  };
}

test("parses an array of new ontologies", () => {
  assert.deepEqual(
    parseAddOntologiesRequest([
      { name: " Wine ", sourceUrl: "https://ontologies.example/wine.ttl", nodeCount: 4, isPublic: true },
      { name: "Pizza", sourceUrl: "https://ontologies.example/pizza.ttl" },
    ]),
    [
      { name: "Wine", sourceUrl: "https://ontologies.example/wine.ttl", nodeCount: 4, isPublic: true },
      { name: "Pizza", sourceUrl: "https://ontologies.example/pizza.ttl", isPublic: false },
    ],
  );
  assert.deepEqual(parseAddOntologiesRequest([]), []);
  assert.equal(parseAddOntologiesRequest({ name: "Wine" }), null);
  assert.equal(parseAddOntologiesRequest([{ name: "Wine" }]), null);
  assert.equal(
    parseAddOntologiesRequest([{ name: "Wine", sourceUrl: "https://ontologies.example/w", nodeCount: -1 }]),
    null,
  );
  assert.equal(
    parseAddOntologiesRequest([{ name: "Wine", sourceUrl: "https://ontologies.example/w", isPublic: "yes" }]),
    null,
  );
});

test("creates ontologies owned by the caller and skips duplicates", async () => {
  const temp = createTempDbPath();
  const issuer = await createTestIssuer();
  const app = await buildServer({ dbPath: temp.dbPath, auth: createTestAuthContext(issuer) });
  const authorization = bearer(await issuer.sign());
  try {
    const first = await app.inject({
      method: "POST",
      url: "/add_ontologies",
      headers: { authorization },
      payload: [
        { name: "Wine", sourceUrl: "https://ontologies.example/wine.ttl", isPublic: true },
        { name: "Pizza", sourceUrl: "https://ontologies.example/pizza.ttl" },
      ],
    });
    assert.equal(first.statusCode, 201);
    const firstBody = first.json() as AddOntologiesResponse;
    assert.deepEqual(
      firstBody.created.map((entry) => entry.name),
      ["Wine", "Pizza"],
    );
    assert.equal(firstBody.skipped, 0);
    assert.equal(firstBody.message, "Successfully added 2 ontologies. Skipped 0 ontologies that already existed.");

    const second = await app.inject({
      method: "POST",
      url: "/add_ontologies",
      headers: { authorization },
      payload: [{ name: "Wine again", sourceUrl: "https://ontologies.example/wine.ttl" }],
    });
    assert.equal(second.statusCode, 201);
    const secondBody = second.json() as AddOntologiesResponse;
    assert.deepEqual(secondBody.created, []);
    assert.equal(secondBody.skipped, 1);
  } finally {
    await app.close();
  }

  const store = new SqliteOntologyStore(temp.dbPath);
  try {
    const wine = store.findOntologyBySourceUrl("https://ontologies.example/wine.ttl");
    assert.equal(wine?.name, "Wine");
    assert.equal(wine?.ownerEmail, TEST_EMAIL);
  } finally {
    store.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("records the subject as owner when the token carries no email", async () => {
  const temp = createTempDbPath();
  const store = new SqliteOntologyStore(temp.dbPath);
  const issuer = await createTestIssuer();
  const app = await buildServer({ store, auth: createTestAuthContext(issuer) });
  try {
    const res = await app.inject({
      method: "POST",
      url: "/add_ontologies",
      headers: { authorization: bearer(await issuer.sign({ email: null })) },
      payload: [{ name: "Wine", sourceUrl: "https://ontologies.example/wine.ttl" }],
    });
    assert.equal(res.statusCode, 201);
    const [created] = (res.json() as AddOntologiesResponse).created;
    assert.equal(store.getOntology(created.uuid)?.ownerEmail, TEST_SUBJECT);
  } finally {
    await app.close();
    store.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("rejects a body that is not an array", async () => {
  const temp = createTempDbPath();
  const issuer = await createTestIssuer();
  const app = await buildServer({ dbPath: temp.dbPath, auth: createTestAuthContext(issuer) });
  try {
    const res = await app.inject({
      method: "POST",
      url: "/add_ontologies",
      headers: { authorization: bearer(await issuer.sign()) },
      payload: { name: "Wine", sourceUrl: "https://ontologies.example/wine.ttl" },
    });
    assert.equal(res.statusCode, 400);
    assert.equal(res.json().error, "invalid_request");
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("does not touch the store for unauthenticated callers", async () => {
  const temp = createTempDbPath();
  const store = new SqliteOntologyStore(temp.dbPath);
  const issuer = await createTestIssuer();
  const app = await buildServer({ store, auth: createTestAuthContext(issuer) });
  try {
    const res = await app.inject({
      method: "POST",
      url: "/add_ontologies",
      headers: { authorization: "Bearer forged.token.value" },
      payload: [{ name: "Wine", sourceUrl: "https://ontologies.example/wine.ttl" }],
    });
    assert.equal(res.statusCode, 401);
    assert.equal(res.json().reason, "malformed-credential");
    assert.equal(store.findOntologyBySourceUrl("https://ontologies.example/wine.ttl"), null);
  } finally {
    await app.close();
    store.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});
