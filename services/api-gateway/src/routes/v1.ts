import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { FastifyInstance } from "fastify";
import { isTerminal } from "@image-triage/shared";
import type { ClassificationResult, WorkItem, WorkItemStats, WorkItemStatus } from "@image-triage/shared";
import type { WorkItemStore } from "@image-triage/store";
import type { StatusQueryService } from "../domain/status-query.js";

export type V1Deps = {
  store: WorkItemStore;
  statusQuery: StatusQueryService;
  statusPollIntervalMs: number;
  clock: () => Date;
};

const idSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._:-]+$/, "may only contain letters, digits and . _ : -");

const presentResult = (result: ClassificationResult) => ({
  label: result.label,
  confidence: result.confidence,
  score_distribution: result.scoreDistribution,
  model_version: result.modelVersion,
  processing_time_ms: result.processingTimeMs,
});

const presentStatus = (id: string, status: WorkItemStatus, pollAfterMs: number) => ({
  id,
  state: status.state,
  ...(status.result ? { result: presentResult(status.result) } : {}),
  ...(status.failureReason
    ? { failure_reason: status.failureReason.detail, failure_kind: status.failureReason.kind }
    : {}),
  ...(isTerminal(status.state) ? {} : { poll_after_ms: pollAfterMs }),
});

const presentSummary = (item: WorkItem) => ({
  id: item.id,
  state: item.state,
  payload_ref: item.payloadRef,
  created_at: item.createdAt,
  updated_at: item.updatedAt,
  ...(item.state === "done" ? { label: item.result.label, confidence: item.result.confidence } : {}),
  ...(item.state === "failed" ? { failure_reason: item.failureReason.detail } : {}),
});

const presentStats = (stats: WorkItemStats) => ({
  total: stats.total,
  by_state: stats.byState,
  by_label: stats.byLabel.map((entry) => ({
    label: entry.label,
    count: entry.count,
    avg_confidence: entry.avgConfidence,
  })),
  average_confidence: stats.averageConfidence,
  average_processing_time_ms: stats.averageProcessingTimeMs,
});

export const registerV1Routes = (app: FastifyInstance, deps: V1Deps) => {
  const { store, statusQuery, statusPollIntervalMs, clock } = deps;

  app.post("/v1/items", async (request, reply) => {
    const schema = z.object({
      id: idSchema.optional(),
      owner_ref: z.string().trim().min(1),
      payload_ref: z.string().trim().min(1),
    });
    const body = schema.parse(request.body);
    const item = await store.create(
      { id: body.id ?? randomUUID(), ownerRef: body.owner_ref, payloadRef: body.payload_ref },
      clock(),
    );
    request.log.info({ itemId: item.id, ownerRef: item.ownerRef }, "work item submitted");
    return reply.status(201).send({ id: item.id, state: item.state, created_at: item.createdAt });
  });

  app.get("/v1/items/:itemId/status", async (request, reply) => {
    const params = z.object({ itemId: idSchema }).parse(request.params);
    const status = await statusQuery.getStatus(params.itemId);
    if (!isTerminal(status.state)) {
      reply.header("retry-after", String(Math.max(1, Math.ceil(statusPollIntervalMs / 1000))));
    }
    reply.header("cache-control", "no-store");
    return reply.send(presentStatus(params.itemId, status, statusPollIntervalMs));
  });

  app.get("/v1/owners/:ownerRef/items", async (request, reply) => {
    const params = z.object({ ownerRef: z.string().min(1) }).parse(request.params);
    const query = z.object({ limit: z.coerce.number().int().min(1).max(100).default(20) }).parse(request.query);
    const items = await store.listByOwner(params.ownerRef, query.limit);
    return reply.send({ items: items.map(presentSummary) });
  });

  app.get("/v1/stats", async (_request, reply) => {
    return reply.send(presentStats(await store.getStats()));
  });
};
