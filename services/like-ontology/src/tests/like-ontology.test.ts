import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { SqliteOntologyStore } from "@ontology-marketplace/catalog-store";
import {
  bearer,
  createTestAuthContext,
  createTestIssuer,
} from "@ontology-marketplace/shared/testing";
import { buildServer } from "../server.js";

test("likes count once per caller", async () => {
  const dir = mkdtempSync(join(tmpdir(), "like-ontology-"));
  const store = new SqliteOntologyStore(join(dir, "catalog.db"));
  const [ontology] = store.addOntologies(
    [{ name: "Wine", sourceUrl: "https://ontologies.example/wine.ttl", isPublic: true }],
    "alice@example.com",
  ).created;
  const issuer = await createTestIssuer();
  const app = await buildServer({ store, auth: createTestAuthContext(issuer) });
  try {
    const url = `/like_ontology/${ontology.uuid}`;
    const bob = bearer(await issuer.sign({ email: "bob@example.com", subject: "bob-uid" }));
    const carol = bearer(await issuer.sign({ email: "carol@example.com", subject: "carol-uid" }));

    const first = await app.inject({ method: "POST", url, headers: { authorization: bob } });
    assert.equal(first.statusCode, 200);
    assert.deepEqual(first.json(), { ontologyId: ontology.uuid, liked: true, likeCount: 1 });

    const repeat = await app.inject({ method: "POST", url, headers: { authorization: bob } });
    assert.deepEqual(repeat.json(), { ontologyId: ontology.uuid, liked: true, likeCount: 1 });

    const other = await app.inject({ method: "POST", url, headers: { authorization: carol } });
    assert.deepEqual(other.json(), { ontologyId: ontology.uuid, liked: true, likeCount: 2 });

    const missing = await app.inject({
      method: "POST",
      url: "/like_ontology/unknown-id",
      headers: { authorization: bob },
    });
    assert.equal(missing.statusCode, 404);
    assert.equal(missing.json().error, "ontology_not_found");
  } finally {
    await app.close();
    store.close();
    rmSync(dir, { recursive: true, force: true });
  }
});

test("refuses a token minted for another project", async () => {
  const dir = mkdtempSync(join(tmpdir(), "like-ontology-"));
  const issuer = await createTestIssuer();
  const app = await buildServer({ dbPath: join(dir, "catalog.db"), auth: createTestAuthContext(issuer) });
  try {
    const res = await app.inject({
      method: "POST",
      url: "/like_ontology/anything",
      headers: { authorization: bearer(await issuer.sign({ audience: "other-project" })) },
    });
    assert.equal(res.statusCode, 401);
    assert.equal(res.json().reason, "wrong-audience");
  } finally {
    await app.close();
    rmSync(dir, { recursive: true, force: true });
  }
});
