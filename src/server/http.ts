import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { PipelineSpec, Roster } from "../troupe/config/types.js";
import { toTroupeError } from "../troupe/errors.js";
import { createLogger, preview, type Logger } from "../troupe/logger.js";
import type { PipelineEngine } from "../troupe/pipeline/engine.js";
import { RunRegistry, statusForReason } from "../troupe/pipeline/runRegistry.js";
import type { RunOptions } from "../troupe/pipeline/types.js";
import { ConcurrencyLimiter, CapacityExceededError } from "../troupe/utils/concurrencyLimiter.js";

const RunRequestSchema = z.object({
  task: z.string().min(1),
  timeoutMs: z.number().int().positive().optional(),
  /** Chosen by the caller so it can cancel before the response arrives */
  runId: z.string().regex(/^[A-Za-z0-9._-]{1,128}$/, "runId may only contain letters, digits, '.', '_' and '-'").optional()
});

const RunStatusQuery = z.enum(["running", "completed", "failed", "canceled"]).optional();

export type HttpAppOptions = {
  engine: PipelineEngine;
  pipelines: ReadonlyMap<string, PipelineSpec>;
  roster: Roster;
  /** Maximum concurrent pipeline runs */
  maxConcurrentRuns?: number;
  /** Timeout for waiting in queue (ms) */
  queueTimeoutMs?: number;
  registry?: RunRegistry;
  logger?: Logger;
};

export type HttpServerConfig = HttpAppOptions & {
  port: number;
};

export function createHttpApp(options: HttpAppOptions): Hono {
  const app = new Hono();
  const registry = options.registry ?? new RunRegistry();
  const logger = options.logger ?? createLogger("http");

  // Only run entry points go through the limiter; reads and cancels never queue.
  const limiter = new ConcurrencyLimiter({
    maxConcurrent: options.maxConcurrentRuns ?? 5,
    queueTimeoutMs: options.queueTimeoutMs ?? 30_000
  });

  app.onError((err, c) => {
    if (err instanceof CapacityExceededError) {
      return c.json({
        code: "CAPACITY_EXCEEDED",
        message: err.message,
        retryAfterMs: err.retryAfterMs
      }, 503);
    }
    const troupeErr = toTroupeError(err);
    switch (troupeErr.code) {
      case "BAD_REQUEST":
        return c.json(troupeErr.toJSON(), 400);
      case "NOT_FOUND":
        return c.json(troupeErr.toJSON(), 404);
      case "CONFLICT":
        return c.json(troupeErr.toJSON(), 409);
      case "CONFIGURATION_ERROR":
        return c.json(troupeErr.toJSON(), 422);
      default:
        logger.error("request_failed", { path: c.req.path, message: troupeErr.message });
        return c.json(troupeErr.toJSON(), 500);
    }
  });

  app.get("/health", (c) => {
    return c.json({
      ok: true,
      pipelines: options.pipelines.size,
      agents: options.roster.size,
      runs: registry.stats(),
      limiter: {
        running: limiter.running,
        queued: limiter.queued,
        atCapacity: limiter.atCapacity
      }
    });
  });

  app.get("/pipelines", (c) => {
    const pipelines = [...options.pipelines.values()].map((p) => ({
      name: p.name,
      strategy: p.strategy,
      agents: p.agents,
      maxRounds: p.maxRounds,
      ...(p.supervisorAgent !== undefined && { supervisorAgent: p.supervisorAgent })
    }));
    return c.json({ pipelines });
  });

  app.post("/pipelines/:name/run", async (c) => {
    const name = c.req.param("name");
    const spec = options.pipelines.get(name);
    if (!spec) {
      return c.json({ code: "NOT_FOUND", message: `Pipeline ${name} not found` }, 404);
    }

    let json: unknown;
    try {
      json = await c.req.json();
    } catch {
      return c.json({ code: "BAD_REQUEST", message: "Invalid JSON body" }, 400);
    }

    const parsed = RunRequestSchema.safeParse(json);
    if (!parsed.success) {
      return c.json(toTroupeError(parsed.error).toJSON(), 400);
    }
    const { task, timeoutMs, runId } = parsed.data;

    const result = await limiter.run(async () => {
      const { id, signal } = registry.create(spec.name, task, runId);
      logger.info("run_accepted", { runId: id, pipeline: spec.name, task: preview(task) });
      const runOptions: RunOptions = { runId: id, signal };
      if (timeoutMs !== undefined) runOptions.timeoutMs = timeoutMs;
      try {
        const runResult = await options.engine.run(spec, task, options.roster, runOptions);
        registry.setResult(id, runResult);
        return runResult;
      } catch (err) {
        registry.delete(id);
        throw err;
      }
    });

    return c.json({
      runId: result.runId,
      status: statusForReason(result.reason),
      result
    });
  });

  app.get("/runs", (c) => {
    const status = RunStatusQuery.parse(c.req.query("status"));
    return c.json({ runs: registry.list(status), stats: registry.stats() });
  });

  app.get("/runs/:id", (c) => {
    const id = c.req.param("id");
    const run = registry.get(id);
    if (!run) {
      return c.json({ code: "NOT_FOUND", message: `Run ${id} not found` }, 404);
    }
    return c.json(run);
  });

  app.post("/runs/:id/cancel", (c) => {
    const id = c.req.param("id");
    if (!registry.cancel(id)) {
      return c.json({ code: "NOT_FOUND", message: `Run ${id} not found or already finished` }, 404);
    }
    return c.json({ canceled: true, runId: id });
  });

  return app;
}

export function startHttpServer(options: HttpServerConfig): ReturnType<typeof serve> {
  const app = createHttpApp(options);
  const server = serve({ fetch: app.fetch, port: options.port });
  // stderr keeps stdout free for tools that pipe this process
  process.stderr.write(`[troupe] HTTP server listening on http://localhost:${options.port}\n`);
  return server;
}
