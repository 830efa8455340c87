import assert from "node:assert/strict";
import test from "node:test";
import { EntityLifecycleService } from "../../lifecycle/entity-lifecycle.service";
import { InMemoryVectorIndex } from "../../matching/vector-index";
import {
  ConcurrentModificationError,
  EmbeddingGatewayError,
  EntityNotFoundError,
  InvalidWeightsError,
  LifecycleError,
  StoreUnavailableError,
  ValidationError,
} from "../../shared/errors";
import {
  buildCanonicalText,
  computeEmbeddingFingerprint,
  parseEntitySubmission,
} from "../../profiles/entity.schemas";
import { EntityRecord } from "../../shared/types/entity.types";
import { InMemoryEntityStore } from "../../storage/in-memory-entity.store";
import {
  assertStoresConsistent,
  FAST_RETRY,
  FakeEmbeddingGateway,
  hashVector,
  SEED_TIMESTAMP,
  silentLogger,
  TEST_DIMENSION,
} from "../helpers/fixtures";

class FlakyStore extends InMemoryEntityStore {
  failInserts = false;
  failUpdates = false;

  async insertEntity(record: EntityRecord): Promise<EntityRecord> {
    if (this.failInserts) {
      throw new StoreUnavailableError("store down");
    }
    return super.insertEntity(record);
  }

  /** Runs once, right before the next update reaches the store. */
  beforeNextUpdate: (() => Promise<void>) | null = null;

  async updateEntity(record: EntityRecord, expectedVersion: number): Promise<EntityRecord> {
    const hook = this.beforeNextUpdate;
    this.beforeNextUpdate = null;
    if (hook) {
      await hook();
    }
    if (this.failUpdates) {
      throw new StoreUnavailableError("store down");
    }
    return super.updateEntity(record, expectedVersion);
  }

  /** A write from another process that does not take this process's lock. */
  async commitElsewhere(record: EntityRecord, expectedVersion: number): Promise<EntityRecord> {
    return super.updateEntity(record, expectedVersion);
  }
}

function setup(embeddings = new FakeEmbeddingGateway()) {
  const store = new FlakyStore();
  const index = new InMemoryVectorIndex(TEST_DIMENSION);
  const service = new EntityLifecycleService(store, index, embeddings, silentLogger, {
    embeddingModel: "test-embedding",
    embeddingRetry: FAST_RETRY,
    backendRetry: FAST_RETRY,
    now: () => new Date(SEED_TIMESTAMP),
  });
  return { store, index, embeddings, service };
}

function candidate(skills: string[], title = "Engineer") {
  return { externalId: "cand-1", title, attributes: { skills } };
}

function lastCallText(embeddings: FakeEmbeddingGateway): string {
  return embeddings.calls[embeddings.calls.length - 1]?.text ?? "";
}

test("creates an entity with one vector under its internal id", async () => {
  const { store, index, embeddings, service } = setup();

  const result = await service.submitEntity("candidate", candidate(["Python"]));

  assert.equal(result.created, true);
  assert.equal(result.reembedded, true);
  assert.equal(result.entity.version, 1);
  assert.deepEqual(result.entity.vectorRef, { collection: "candidates", pointId: result.entity.internalId });
  assert.equal(result.entity.embeddingModel, "test-embedding");
  assert.deepEqual(embeddings.calls.map((call) => call.modelVersion), ["test-embedding"]);
  assert.equal(index.size("candidate"), 1);
  await assertStoresConsistent(store, index);
});

test("keeps exactly one vector across repeated content updates", async () => {
  const { store, index, embeddings, service } = setup();

  let last = await service.submitEntity("candidate", candidate(["Python"]));
  for (const skill of ["Go", "Rust", "Kotlin"]) {
    last = await service.submitEntity("candidate", candidate(["Python", skill]));
  }

  assert.equal(last.created, false);
  assert.equal(last.entity.version, 4);
  assert.equal(embeddings.calls.length, 4);
  assert.equal(index.size("candidate"), 1);
  assert.ok(last.entity.vectorRef);
  assert.deepEqual(await index.fetch(last.entity.vectorRef), hashVector(lastCallText(embeddings)));
  await assertStoresConsistent(store, index);
});

test("skips embedding when the content is unchanged", async () => {
  const { embeddings, service } = setup();
  await service.submitEntity("candidate", candidate(["Python"]));

  const again = await service.submitEntity("candidate", candidate(["Python"]));

  assert.equal(again.reembedded, false);
  assert.equal(again.created, false);
  assert.equal(again.entity.version, 2);
  assert.equal(embeddings.calls.length, 1);
});

test("reuses the stored vector when only the organization changes", async () => {
  const { index, embeddings, service } = setup();
  const job = { externalId: "job-1", title: "Backend", attributes: { requiredSkills: ["Go"] } };
  const created = await service.submitEntity("job", { ...job, organizationId: "org-1" });

  const moved = await service.submitEntity("job", { ...job, organizationId: "org-2" });

  assert.equal(moved.reembedded, false);
  assert.equal(moved.entity.organizationId, "org-2");
  assert.equal(embeddings.calls.length, 1);
  const hits = await index.search("job", hashVector(lastCallText(embeddings)), {
    topK: 5,
    scoreFloor: 0,
    filters: { organizationIds: ["org-2"] },
  });
  assert.deepEqual(
    hits.map((hit) => hit.internalId),
    [created.entity.internalId],
  );
});

test("retries transient embedding failures", async () => {
  const { embeddings, service } = setup();
  embeddings.failures.push(new EmbeddingGatewayError("rate_limited", "slow down"));

  const result = await service.submitEntity("candidate", candidate(["Python"]));

  assert.equal(result.created, true);
  assert.equal(embeddings.calls.length, 2);
});

test("does not retry invalid embedding input and leaves both stores untouched", async () => {
  const { store, index, embeddings, service } = setup();
  embeddings.failures.push(new EmbeddingGatewayError("invalid_input", "too long"));

  await assert.rejects(service.submitEntity("candidate", candidate(["Python"])), (error: unknown) => {
    assert.ok(error instanceof LifecycleError);
    assert.equal(error.code, "EMBEDDING_INVALID_INPUT");
    assert.equal(error.details.stage, "embed");
    return true;
  });
  assert.equal(embeddings.calls.length, 1);
  assert.equal(index.size("candidate"), 0);
  assert.deepEqual(store.snapshot(), []);
});

test("rejects vectors of the wrong dimension", async () => {
  const { index, service } = setup(new FakeEmbeddingGateway(() => [1, 0]));

  await assert.rejects(service.submitEntity("candidate", candidate(["Python"])), (error: unknown) => {
    assert.ok(error instanceof LifecycleError);
    assert.equal(error.code, "DIMENSION_MISMATCH");
    return true;
  });
  assert.equal(index.size("candidate"), 0);
});

test("removes the new vector when the first metadata commit fails", async () => {
  const { store, index, service } = setup();
  store.failInserts = true;

  await assert.rejects(service.submitEntity("candidate", candidate(["Python"])), (error: unknown) => {
    assert.ok(error instanceof LifecycleError);
    assert.equal(error.code, "STORE_UNAVAILABLE");
    assert.deepEqual(error.details, {
      sagaState: "compensated",
      failedStep: "commit_metadata",
      externalId: "cand-1",
    });
    return true;
  });
  assert.equal(index.size("candidate"), 0);
  await assertStoresConsistent(store, index);
});

test("restores the prior vector when an update commit fails", async () => {
  const { store, index, service } = setup();
  const first = await service.submitEntity("candidate", candidate(["Python"]));
  assert.ok(first.entity.vectorRef);
  const before = await index.fetch(first.entity.vectorRef);

  store.failUpdates = true;
  await assert.rejects(service.submitEntity("candidate", candidate(["Python", "Go"])), LifecycleError);

  assert.deepEqual(await index.fetch(first.entity.vectorRef), before);
  const row = await store.getByExternalId("candidate", "cand-1");
  assert.equal(row?.version, 1);
  await assertStoresConsistent(store, index);
});

test("re-embeds content committed by another writer while an update was in flight", async () => {
  const { store, index, embeddings, service } = setup();
  const first = await service.submitEntity("candidate", candidate(["Python"]));
  const other = parseEntitySubmission("candidate", candidate(["Go"]));
  const otherText = buildCanonicalText(other);

  // The other writer embedded its content before this update upserted, and commits before it.
  store.beforeNextUpdate = async () => {
    const row = await store.getByExternalId("candidate", "cand-1");
    assert.ok(row);
    await store.commitElsewhere(
      {
        ...row,
        attributes: other.attributes,
        embeddingFingerprint: computeEmbeddingFingerprint("test-embedding", otherText),
      },
      row.version,
    );
  };
  await assert.rejects(service.submitEntity("candidate", candidate(["Rust"])), (error: unknown) => {
    assert.ok(error instanceof LifecycleError);
    assert.equal(error.code, "CONCURRENT_MODIFICATION");
    assert.equal(error.details.sagaState, "compensated");
    return true;
  });

  const invalidated = await store.getByExternalId("candidate", "cand-1");
  assert.equal(invalidated?.version, 3);
  assert.equal(invalidated?.embeddingFingerprint, null);

  const resubmitted = await service.submitEntity("candidate", candidate(["Go"]));
  assert.equal(resubmitted.reembedded, true);
  assert.equal(lastCallText(embeddings), otherText);
  assert.ok(first.entity.vectorRef);
  assert.deepEqual(await index.fetch(first.entity.vectorRef), hashVector(otherText));
  await assertStoresConsistent(store, index);
});

test("serializes concurrent submissions for the same entity", async () => {
  const { store, index, service } = setup();

  const results = await Promise.all([
    service.submitEntity("candidate", candidate(["Python"])),
    service.submitEntity("candidate", candidate(["Python", "Go"])),
  ]);

  assert.deepEqual(
    results.map((result) => result.created),
    [true, false],
  );
  assert.equal(results[1]?.entity.version, 2);
  assert.equal(index.size("candidate"), 1);
  await assertStoresConsistent(store, index);
});

test("refuses to update an entity that is being erased", async () => {
  const { store, service } = setup();
  const created = await service.submitEntity("candidate", candidate(["Python"]));
  await store.updateEntity({ ...created.entity, status: "erasing" }, created.entity.version);

  await assert.rejects(service.submitEntity("candidate", candidate(["Go"])), ConcurrentModificationError);
  await assert.rejects(service.getEntity("candidate", "cand-1"), EntityNotFoundError);
});

test("saves organizations and keeps their creation time", async () => {
  const { service } = setup();

  await assert.rejects(
    service.upsertOrganization({
      externalId: "org-1",
      name: "Acme",
      scoringWeights: { similarity: -1, requiredSkills: 0.5, preferredSkills: 0.5 },
    }),
    InvalidWeightsError,
  );

  const created = await service.upsertOrganization({ externalId: "org-1", name: "Acme" });
  const renamed = await service.upsertOrganization({
    externalId: "org-1",
    name: "Acme GmbH",
    scoringWeights: { similarity: 1, requiredSkills: 1, preferredSkills: 0 },
  });
  assert.equal(created.scoringWeights, null);
  assert.equal(renamed.name, "Acme GmbH");
  assert.equal(renamed.createdAt, created.createdAt);
  assert.deepEqual(renamed.scoringWeights, { similarity: 1, requiredSkills: 1, preferredSkills: 0 });
});

test("records applications against the job's organization", async () => {
  const { store, service } = setup();
  const person = await service.submitEntity("candidate", candidate(["Python"]));
  const job = await service.submitEntity("job", {
    externalId: "job-1",
    title: "Backend",
    organizationId: "org-1",
    attributes: {},
  });
  await service.submitEntity("job", { externalId: "job-2", title: "Frontend", attributes: {} });

  const application = await service.recordApplication({ candidateExternalId: "cand-1", jobExternalId: "job-1" });
  assert.equal(application.organizationId, "org-1");
  assert.equal(application.candidateId, person.entity.internalId);
  assert.equal(application.jobId, job.entity.internalId);
  assert.equal(application.status, "applied");
  assert.equal(application.appliedAt, SEED_TIMESTAMP);
  assert.equal((await store.listApplicationsForEntity("candidate", person.entity.internalId)).length, 1);

  await assert.rejects(
    service.recordApplication({ candidateExternalId: "cand-1", jobExternalId: "job-2" }),
    ValidationError,
  );
  await assert.rejects(
    service.recordApplication({ candidateExternalId: "nobody", organizationId: "org-1" }),
    EntityNotFoundError,
  );
});
