import assert from "node:assert/strict";
import test from "node:test";
import {
  buildVectorMetadata,
  cosineSimilarity,
  InMemoryVectorIndex,
  toVectorSearchFilters,
  VectorMetadata,
} from "../../matching/vector-index";
import { DimensionMismatchError } from "../../shared/errors";
import { attributes, SEED_TIMESTAMP } from "../helpers/fixtures";

function metadata(partial: Partial<VectorMetadata> = {}): VectorMetadata {
  return {
    externalId: "ext",
    category: "candidate",
    createdAt: SEED_TIMESTAMP,
    educationLevel: "none",
    locations: [],
    jobTypes: [],
    organizationId: null,
    ...partial,
  };
}

test("upsert replaces the point stored under the same internal id", async () => {
  const index = new InMemoryVectorIndex(3);
  const ref = await index.upsert("candidate", "id-1", [1, 0, 0], metadata());
  assert.deepEqual(ref, { collection: "candidates", pointId: "id-1" });

  await index.upsert("candidate", "id-1", [0, 1, 0], metadata());
  assert.equal(index.size("candidate"), 1);
  assert.deepEqual(await index.fetch(ref), [0, 1, 0]);
});

test("delete reports whether the point existed", async () => {
  const index = new InMemoryVectorIndex(3);
  const ref = await index.upsert("job", "id-1", [1, 0, 0], metadata({ category: "job" }));
  assert.equal(await index.delete(ref), "ok");
  assert.equal(await index.delete(ref), "not_found");
  assert.equal(await index.fetch(ref), null);
});

test("rejects vectors of the wrong dimension", async () => {
  const index = new InMemoryVectorIndex(3);
  await assert.rejects(index.upsert("job", "id-1", [1, 0], metadata()), DimensionMismatchError);
  await assert.rejects(
    index.search("job", [1, 0, 0, 0], { topK: 5, scoreFloor: 0 }),
    DimensionMismatchError,
  );
});

test("search orders by similarity then internal id and applies the floor", async () => {
  const index = new InMemoryVectorIndex(2);
  await index.upsert("candidate", "b", [1, 0], metadata());
  await index.upsert("candidate", "a", [1, 0], metadata());
  await index.upsert("candidate", "c", [0.6, 0.8], metadata());
  await index.upsert("candidate", "d", [-1, 0], metadata());

  const hits = await index.search("candidate", [1, 0], { topK: 10, scoreFloor: 0 });
  assert.deepEqual(
    hits.map((hit) => hit.internalId),
    ["a", "b", "c"],
  );
  assert.ok(Math.abs((hits[2]?.similarity ?? 0) - 0.6) < 1e-9);

  const limited = await index.search("candidate", [1, 0], { topK: 1, scoreFloor: 0 });
  assert.deepEqual(
    limited.map((hit) => hit.internalId),
    ["a"],
  );
});

test("search applies payload filters and exclusions", async () => {
  const index = new InMemoryVectorIndex(2);
  await index.upsert("job", "remote", [1, 0], metadata({ category: "job", locations: ["remote"], organizationId: "org-1" }));
  await index.upsert("job", "berlin", [1, 0], metadata({ category: "job", locations: ["berlin"], organizationId: "org-1" }));
  await index.upsert("job", "other", [1, 0], metadata({ category: "job", locations: ["remote"], organizationId: "org-2" }));

  const hits = await index.search("job", [1, 0], {
    topK: 10,
    scoreFloor: 0,
    filters: toVectorSearchFilters({ locations: [" Remote "], organizationIds: ["org-1"] }, []),
  });
  assert.deepEqual(
    hits.map((hit) => hit.internalId),
    ["remote"],
  );

  const eitherOrganization = await index.search("job", [1, 0], {
    topK: 10,
    scoreFloor: 0,
    filters: toVectorSearchFilters({ locations: ["remote"], organizationIds: ["org-1", "org-2"] }, []),
  });
  assert.deepEqual(
    eitherOrganization.map((hit) => hit.internalId),
    ["other", "remote"],
  );

  const excluded = await index.search("job", [1, 0], {
    topK: 10,
    scoreFloor: 0,
    filters: { excludeInternalIds: ["berlin", "other"] },
  });
  assert.deepEqual(
    excluded.map((hit) => hit.internalId),
    ["remote"],
  );
});

test("lists point ids page by page", async () => {
  const index = new InMemoryVectorIndex(2);
  for (const id of ["c", "a", "e", "b", "d"]) {
    await index.upsert("candidate", id, [1, 0], metadata());
  }
  const first = await index.listInternalIds("candidate", null, 2);
  assert.deepEqual(first, { ids: ["a", "b"], nextCursor: "b" });
  const second = await index.listInternalIds("candidate", first.nextCursor, 2);
  assert.deepEqual(second, { ids: ["c", "d"], nextCursor: "d" });
  const last = await index.listInternalIds("candidate", second.nextCursor, 2);
  assert.deepEqual(last, { ids: ["e"], nextCursor: null });
});

test("lowercases tag-like metadata", () => {
  const built = buildVectorMetadata({
    category: "candidate",
    externalId: "cand-1",
    internalId: "id-1",
    organizationId: null,
    title: "Engineer",
    attributes: attributes({ locationPreferences: ["Berlin"], jobTypes: ["Full-Time"], educationLevel: "master" }),
    vectorRef: null,
    embeddingFingerprint: null,
    embeddingModel: null,
    status: "active",
    version: 1,
    createdAt: SEED_TIMESTAMP,
    updatedAt: SEED_TIMESTAMP,
  });
  assert.deepEqual(built, {
    externalId: "cand-1",
    category: "candidate",
    createdAt: SEED_TIMESTAMP,
    educationLevel: "master",
    locations: ["berlin"],
    jobTypes: ["full-time"],
    organizationId: null,
  });
});

test("cosine similarity of zero vectors is zero", () => {
  assert.equal(cosineSimilarity([0, 0], [1, 0]), 0);
  assert.equal(cosineSimilarity([2, 0], [3, 0]), 1);
});
