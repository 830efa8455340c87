import { NextFunction, Request, Response, Router } from "express";
import { errorMessage, Logger } from "../config/logger";
import { EntityLifecycleService } from "../lifecycle/entity-lifecycle.service";
import { MatchingEngine } from "../matching/matching.engine";
import { DataDeletionService } from "../privacy/data-deletion.service";
import { RetentionSweepService } from "../privacy/retention-sweep.service";
import {
  isRecord,
  parseCategory,
  parseMatchFilters,
  parseRankingWeights,
} from "../profiles/entity.schemas";
import { MatchingCoreError, ValidationError } from "../shared/errors";
import { EntityCategory, EntityRecord } from "../shared/types/entity.types";
import { MatchRequest } from "../shared/types/matching.types";

export interface ApiRouterDeps {
  lifecycleService: EntityLifecycleService;
  dataDeletionService: DataDeletionService;
  matchingEngine: MatchingEngine;
  retentionSweepService: RetentionSweepService;
  logger: Logger;
}

type AsyncHandler = (request: Request, response: Response) => Promise<void>;

export function buildApiRouter(deps: ApiRouterDeps): Router {
  const router = Router();
  const handle =
    (handler: AsyncHandler) =>
    (request: Request, response: Response, next: NextFunction): void => {
      handler(request, response).catch(next);
    };

  router.put(
    "/organizations/:externalId",
    handle(async (request, response) => {
      const body = isRecord(request.body) ? request.body : {};
      const organization = await deps.lifecycleService.upsertOrganization({
        ...body,
        externalId: request.params.externalId,
      });
      response.status(200).json({ organization });
    }),
  );

  router.post(
    "/applications",
    handle(async (request, response) => {
      const application = await deps.lifecycleService.recordApplication(request.body);
      response.status(201).json({ application });
    }),
  );

  router.post(
    "/maintenance/retention-sweep",
    handle(async (_request, response) => {
      const report = await deps.retentionSweepService.runRetentionSweep();
      response.status(report ? 200 : 409).json({ ok: Boolean(report), report });
    }),
  );

  router.post(
    "/:category",
    handle(async (request, response) => {
      const category = parseCategory(request.params.category);
      const result = await deps.lifecycleService.submitEntity(category, request.body);
      response.status(result.created ? 201 : 200).json({
        entity: toEntityView(result.entity),
        created: result.created,
        reembedded: result.reembedded,
      });
    }),
  );

  router.get(
    "/:category/:externalId",
    handle(async (request, response) => {
      const category = parseCategory(request.params.category);
      const entity = await deps.lifecycleService.getEntity(category, request.params.externalId);
      response.status(200).json({ entity: toEntityView(entity) });
    }),
  );

  router.delete(
    "/:category/:externalId",
    handle(async (request, response) => {
      const category = parseCategory(request.params.category);
      const result = await deps.dataDeletionService.eraseEntity(category, request.params.externalId);
      response.status(200).json(result);
    }),
  );

  router.post(
    "/:category/:externalId/matches",
    handle(async (request, response) => {
      const category = parseCategory(request.params.category);
      const controller = new AbortController();
      response.on("close", () => {
        if (!response.writableEnded) {
          controller.abort();
        }
      });
      const matchRequest = parseMatchRequest(category, request.params.externalId, request.body);
      const result = await deps.matchingEngine.findMatches({ ...matchRequest, signal: controller.signal });
      response.status(200).json(result);
    }),
  );

  return router;
}

/** Error middleware for the whole app, so body-parser failures are mapped too. */
export function errorHandler(logger: Logger) {
  return (error: unknown, _request: Request, response: Response, _next: NextFunction): void => {
    sendError(response, error, logger);
  };
}

export function sendError(response: Response, error: unknown, logger: Logger): void {
  if (response.headersSent) {
    return;
  }
  if (error instanceof MatchingCoreError) {
    response.status(error.httpStatus).json({
      error: {
        code: error.code,
        message: error.message,
        retryable: error.retryable,
        details: error.details,
      },
    });
    return;
  }
  if (error instanceof SyntaxError) {
    response.status(400).json({
      error: { code: "VALIDATION_ERROR", message: "Request body is not valid JSON", retryable: false, details: {} },
    });
    return;
  }
  logger.error("http.request.failed", { error: errorMessage(error) });
  response.status(500).json({
    error: { code: "INTERNAL_ERROR", message: "Internal error", retryable: true, details: {} },
  });
}

function parseMatchRequest(category: EntityCategory, externalId: string, raw: unknown): MatchRequest {
  const body = isRecord(raw) ? raw : {};
  const issues: string[] = [];
  const topK = optionalNumber(body.topK, "topK", issues);
  const minSimilarity = optionalNumber(body.minSimilarity, "minSimilarity", issues);
  if (body.explain !== undefined && typeof body.explain !== "boolean") {
    issues.push("explain must be a boolean");
  }
  if (body.requestedBy !== undefined && typeof body.requestedBy !== "string") {
    issues.push("requestedBy must be a string");
  }
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
  return {
    category,
    externalId,
    topK,
    minSimilarity,
    weights: parseRankingWeights(body.weights),
    filters: parseMatchFilters(body.filters),
    explain: body.explain === true,
    requestedBy: typeof body.requestedBy === "string" ? body.requestedBy : undefined,
  };
}

function optionalNumber(value: unknown, field: string, issues: string[]): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    issues.push(`${field} must be a number`);
    return undefined;
  }
  return value;
}

/** Public view of an entity; the vector reference stays internal. */
function toEntityView(entity: EntityRecord): Record<string, unknown> {
  return {
    category: entity.category,
    externalId: entity.externalId,
    internalId: entity.internalId,
    organizationId: entity.organizationId,
    title: entity.title,
    attributes: entity.attributes,
    embedded: entity.vectorRef !== null,
    embeddingModel: entity.embeddingModel,
    version: entity.version,
    createdAt: entity.createdAt,
    updatedAt: entity.updatedAt,
  };
}
