import assert from "node:assert/strict";
import { Server } from "node:http";
import test from "node:test";
import fetch from "node-fetch";
import { createApp } from "../../app";
import { loadEnv } from "../../config/env";
import { InMemoryVectorIndex } from "../../matching/vector-index";
import { isRecord } from "../../profiles/entity.schemas";
import { EmbeddingGatewayError } from "../../shared/errors";
import { InMemoryEntityStore } from "../../storage/in-memory-entity.store";
import { FAST_RETRY, FakeEmbeddingGateway, silentLogger, TEST_DIMENSION } from "../helpers/fixtures";
import { addressOf, closeServer, listen } from "../helpers/stub-server";

interface Harness {
  baseUrl: string;
  embeddings: FakeEmbeddingGateway;
  server: Server;
}

async function startApp(): Promise<Harness> {
  const env = loadEnv({
    OPENAI_API_KEY: "test-key",
    EMBEDDING_DIMENSION: String(TEST_DIMENSION),
    EXPLANATION_ENABLED: "false",
  });
  const embeddings = new FakeEmbeddingGateway();
  const { app } = createApp(env, {
    logger: silentLogger,
    store: new InMemoryEntityStore(),
    index: new InMemoryVectorIndex(TEST_DIMENSION),
    embeddings,
    retry: FAST_RETRY,
  });
  const server = await listen(app);
  return { baseUrl: `http://127.0.0.1:${addressOf(server).port}`, embeddings, server };
}

async function call(
  harness: Harness,
  method: string,
  path: string,
  body?: unknown,
): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${harness.baseUrl}${path}`, {
    method,
    headers: { "content-type": "application/json" },
    body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
  });
  const text = await response.text();
  return { status: response.status, body: text ? JSON.parse(text) : null };
}

function pick(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

const CANDIDATE = {
  externalId: "cand-1",
  title: "Backend Developer",
  attributes: { skills: ["Python", "Docker"], educationLevel: "bachelor" },
};
const JOB = {
  externalId: "job-1",
  title: "Backend Engineer",
  organizationId: "org-1",
  attributes: { requiredSkills: ["Python", "PostgreSQL"] },
};

test("entity routes create, read, match and erase", async () => {
  const harness = await startApp();
  try {
    const health = await call(harness, "GET", "/health");
    assert.deepEqual(health, { status: 200, body: { ok: true } });

    const created = await call(harness, "POST", "/v1/candidates", CANDIDATE);
    assert.equal(created.status, 201);
    assert.equal(pick(created.body, "created"), true);
    assert.equal(pick(created.body, "reembedded"), true);
    assert.equal(pick(created.body, "entity", "embedded"), true);
    assert.equal(pick(created.body, "entity", "vectorRef"), undefined);

    const resubmitted = await call(harness, "POST", "/v1/candidates", CANDIDATE);
    assert.equal(resubmitted.status, 200);
    assert.equal(pick(resubmitted.body, "reembedded"), false);
    assert.equal(harness.embeddings.calls.length, 1);

    assert.equal((await call(harness, "POST", "/v1/jobs", JOB)).status, 201);

    const fetched = await call(harness, "GET", "/v1/candidates/cand-1");
    assert.equal(fetched.status, 200);
    assert.equal(pick(fetched.body, "entity", "version"), 2);

    const matches = await call(harness, "POST", "/v1/jobs/job-1/matches", { topK: 5, requestedBy: "recruiter-1" });
    assert.equal(matches.status, 200);
    const results = pick(matches.body, "results");
    assert.ok(Array.isArray(results));
    assert.equal(results.length, 1);
    assert.equal(pick(results[0], "externalId"), "cand-1");
    assert.deepEqual(pick(results[0], "skillCoverage"), { required: 0.5, preferred: 1 });

    const erased = await call(harness, "DELETE", "/v1/candidates/cand-1");
    assert.equal(erased.status, 200);
    assert.equal(pick(erased.body, "status"), "erased");
    assert.deepEqual(pick(erased.body, "deleted"), { applications: 0, matchEvents: 1 });

    await call(harness, "POST", "/v1/candidates", { ...CANDIDATE, externalId: "cand-2" });
    const afterErasure = await call(harness, "POST", "/v1/jobs/job-1/matches", { topK: 5 });
    assert.equal(afterErasure.status, 200);
    const remaining = pick(afterErasure.body, "results");
    assert.ok(Array.isArray(remaining));
    assert.deepEqual(
      remaining.map((result) => pick(result, "externalId")),
      ["cand-2"],
    );

    const again = await call(harness, "DELETE", "/v1/candidates/cand-1");
    assert.deepEqual(again, { status: 200, body: { status: "not_found" } });

    const missing = await call(harness, "GET", "/v1/candidates/cand-1");
    assert.equal(missing.status, 404);
    assert.equal(pick(missing.body, "error", "code"), "ENTITY_NOT_FOUND");
  } finally {
    await closeServer(harness.server);
  }
});

test("maps validation and upstream failures to error responses", async () => {
  const harness = await startApp();
  try {
    const invalid = await call(harness, "POST", "/v1/candidates", { title: "No id", attributes: { skills: ["Go"] } });
    assert.equal(invalid.status, 422);
    assert.deepEqual(pick(invalid.body, "error"), {
      code: "VALIDATION_ERROR",
      message: "Validation failed: externalId is required",
      retryable: false,
      details: { issues: ["externalId is required"] },
    });

    const malformed = await call(harness, "POST", "/v1/candidates", "{not json");
    assert.equal(malformed.status, 400);
    assert.equal(pick(malformed.body, "error", "code"), "VALIDATION_ERROR");

    const category = await call(harness, "POST", "/v1/employers", CANDIDATE);
    assert.equal(category.status, 422);
    assert.deepEqual(pick(category.body, "error", "details"), { issues: ["unknown category: employers"] });

    harness.embeddings.failures.push(new EmbeddingGatewayError("invalid_input", "input rejected"));
    const rejected = await call(harness, "POST", "/v1/candidates", CANDIDATE);
    assert.equal(rejected.status, 422);
    assert.equal(pick(rejected.body, "error", "code"), "EMBEDDING_INVALID_INPUT");
    assert.equal(pick(rejected.body, "error", "retryable"), false);

    assert.equal((await call(harness, "POST", "/v1/jobs", JOB)).status, 201);
    const badTopK = await call(harness, "POST", "/v1/jobs/job-1/matches", { topK: "5" });
    assert.equal(badTopK.status, 422);
    assert.deepEqual(pick(badTopK.body, "error", "details"), { issues: ["topK must be a number"] });

    const outOfRange = await call(harness, "POST", "/v1/jobs/job-1/matches", { topK: 500 });
    assert.equal(outOfRange.status, 422);
  } finally {
    await closeServer(harness.server);
  }
});

test("organization, application and maintenance routes", async () => {
  const harness = await startApp();
  try {
    const badWeights = await call(harness, "PUT", "/v1/organizations/org-1", {
      name: "Acme",
      scoringWeights: { similarity: -1, requiredSkills: 1, preferredSkills: 0 },
    });
    assert.equal(badWeights.status, 422);
    assert.equal(pick(badWeights.body, "error", "code"), "INVALID_WEIGHTS");

    const organization = await call(harness, "PUT", "/v1/organizations/org-1", {
      name: "Acme",
      scoringWeights: { similarity: 1, requiredSkills: 1, preferredSkills: 0 },
    });
    assert.equal(organization.status, 200);
    assert.equal(pick(organization.body, "organization", "externalId"), "org-1");

    await call(harness, "POST", "/v1/candidates", CANDIDATE);
    await call(harness, "POST", "/v1/jobs", JOB);
    const application = await call(harness, "POST", "/v1/applications", {
      candidateExternalId: "cand-1",
      jobExternalId: "job-1",
    });
    assert.equal(application.status, 201);
    assert.equal(pick(application.body, "application", "organizationId"), "org-1");

    const sweep = await call(harness, "POST", "/v1/maintenance/retention-sweep");
    assert.equal(sweep.status, 200);
    assert.equal(pick(sweep.body, "ok"), true);
    assert.deepEqual(pick(sweep.body, "report", "categories", "candidate"), {
      erased: 0,
      failed: 0,
      orphansDeleted: 0,
    });
  } finally {
    await closeServer(harness.server);
  }
});
