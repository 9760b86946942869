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
  TEST_EMAIL,
} from "@ontology-marketplace/shared/testing";
import { buildServer } from "../server.js";

test("grants edit and delete to the owner only", async () => {
  const dir = mkdtempSync(join(tmpdir(), "permissions-"));
  const store = new SqliteOntologyStore(join(dir, "catalog.db"));
  const [ontology] = store.addOntologies(
    [{ name: "Wine", sourceUrl: "https://ontologies.example/wine.ttl", isPublic: true }],
    TEST_EMAIL,
  ).created;
  const issuer = await createTestIssuer();
  const app = await buildServer({ store, auth: createTestAuthContext(issuer) });
  try {
    const url = `/permissions/${ontology.uuid}`;

    const owner = await app.inject({
      method: "GET",
      url,
      headers: { authorization: bearer(await issuer.sign()) },
    });
    assert.equal(owner.statusCode, 200);
    assert.deepEqual(owner.json(), { ontologyId: ontology.uuid, canEdit: true, canDelete: true });

    const stranger = await app.inject({
      method: "GET",
      url,
      headers: { authorization: bearer(await issuer.sign({ email: "bob@example.com" })) },
    });
    assert.deepEqual(stranger.json(), { ontologyId: ontology.uuid, canEdit: false, canDelete: false });

    const missing = await app.inject({
      method: "GET",
      url: "/permissions/unknown-id",
      headers: { authorization: bearer(await issuer.sign()) },
    });
    assert.equal(missing.statusCode, 404);
  } finally {
    await app.close();
    store.close();
    rmSync(dir, { recursive: true, force: true });
  }
});

test("an unverified email is refused by default", async () => {
  const dir = mkdtempSync(join(tmpdir(), "permissions-"));
  const issuer = await createTestIssuer();
  const app = await buildServer({
    dbPath: join(dir, "catalog.db"),
    auth: createTestAuthContext(issuer),
  });
  try {
    const res = await app.inject({
      method: "GET",
      url: "/permissions/anything",
      headers: { authorization: bearer(await issuer.sign({ emailVerified: false })) },
    });
    assert.equal(res.statusCode, 401);
    assert.deepEqual(res.json(), {
      error: "unauthorized",
      reason: "unverified-email",
      message: "Email address on the token is not verified",
    });
  } finally {
    await app.close();
    rmSync(dir, { recursive: true, force: true });
  }
});
