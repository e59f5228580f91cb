/**
 * Calendar API Routes
 *
 * Listing, lifecycle and merge operations on federated calendars.
 */

import type { FastifyInstance } from "fastify";
import {
  BACKEND_OPERATIONS,
  CapabilityNegotiator,
  type MergeReport,
  type Strategy,
} from "@calfed/core";
import { errorBody, parseInput, sendOutcome, type ErrorBody } from "../http.js";
import {
  calendarPatchSchema,
  calendarQuerySchema,
  createCalendarSchema,
  createObjectSchema,
  mergeSchema,
  periodQuerySchema,
} from "../schemas.js";

// ─── Route Types ───

interface CalendarParams {
  id: string;
}

interface BackendSummary {
  name: string;
  /** Strategy per operation: delegate, emulate or unsupported */
  operations: Record<string, Strategy>;
}

interface MergeReportBody {
  destination: string;
  ok: boolean;
  sources: Array<{
    source: string;
    strategy: "native" | "emulated";
    ok: boolean;
    moved: number;
    error?: ErrorBody;
  }>;
}

function toMergeReportBody(report: MergeReport): MergeReportBody {
  return {
    destination: report.destination,
    ok: report.ok,
    sources: report.sources.map(({ error, ...source }) =>
      error ? { ...source, error: errorBody(error) } : source,
    ),
  };
}

/**
 * Register calendar routes
 */
export async function registerCalendarRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  const negotiator = new CapabilityNegotiator();

  /**
   * GET /api/backends
   *
   * Activated backends and how each operation is carried out on them
   */
  fastify.get<{ Reply: { backends: BackendSummary[] } }>(
    "/api/backends",
    async () => {
      const backends = fastify.federation.registry
        .entries()
        .map(([name, backend]) => ({
          name,
          operations: Object.fromEntries(
            BACKEND_OPERATIONS.map((operation) => [
              operation,
              negotiator.negotiate(backend, operation),
            ]),
          ),
        }));
      return { backends };
    },
  );

  /**
   * GET /api/calendars
   *
   * Query params:
   *   - user: user whose calendars are listed (required)
   *   - activeOnly, writableOnly: "true" | "false"
   *   - backends: comma-separated backend names
   */
  fastify.get("/api/calendars", async (request) => {
    const { user, ...filters } = parseInput(calendarQuerySchema, request.query);
    return fastify.federation.listCalendars(user, filters);
  });

  /**
   * POST /api/calendars
   *
   * Create a calendar in the named backend
   */
  fastify.post("/api/calendars", async (request, reply) => {
    const { backend, ...input } = parseInput(createCalendarSchema, request.body);
    const created = await fastify.federation.createCalendar(backend, input);
    return sendOutcome(reply, created, (id) => ({ id }), 201);
  });

  fastify.get<{ Params: CalendarParams }>(
    "/api/calendars/:id",
    async (request, reply) => {
      const found = await fastify.federation.getCalendar(request.params.id);
      return sendOutcome(reply, found, (calendar) => calendar);
    },
  );

  fastify.patch<{ Params: CalendarParams }>(
    "/api/calendars/:id",
    async (request, reply) => {
      const patch = parseInput(calendarPatchSchema, request.body);
      const edited = await fastify.federation.editCalendar(
        request.params.id,
        patch,
      );
      return sendOutcome(reply, edited, () => undefined);
    },
  );

  /**
   * DELETE /api/calendars/:id
   *
   * Responds with `mode: "hidden"` when the backend cannot delete
   */
  fastify.delete<{ Params: CalendarParams }>(
    "/api/calendars/:id",
    async (request, reply) => {
      const deleted = await fastify.federation.deleteCalendar(request.params.id);
      return sendOutcome(reply, deleted, (mode) => ({ mode }));
    },
  );

  fastify.post<{ Params: CalendarParams }>(
    "/api/calendars/:id/touch",
    async (request, reply) => {
      const touched = await fastify.federation.touchCalendar(request.params.id);
      return sendOutcome(reply, touched, () => undefined);
    },
  );

  /**
   * POST /api/calendars/:id/merge
   *
   * Merge `sources` into this calendar. The report lists every source; a
   * failed source does not stop the ones after it. A malformed identifier
   * rejects the request before any source is merged.
   */
  fastify.post<{ Params: CalendarParams }>(
    "/api/calendars/:id/merge",
    async (request) => {
      const { sources } = parseInput(mergeSchema, request.body);
      const report = await fastify.engine.mergeCalendars(
        request.params.id,
        ...sources,
      );
      return toMergeReportBody(report);
    },
  );

  /**
   * GET /api/calendars/:id/objects
   *
   * Optional `start` and `end` (ISO 8601) restrict to objects in that period
   */
  fastify.get<{ Params: CalendarParams }>(
    "/api/calendars/:id/objects",
    async (request, reply) => {
      const { start, end } = parseInput(periodQuerySchema, request.query);
      const listed =
        start && end
          ? await fastify.federation.listObjectsInPeriod(
              request.params.id,
              start,
              end,
            )
          : await fastify.federation.listObjects(request.params.id);
      return sendOutcome(reply, listed, (objects) => objects);
    },
  );

  fastify.post<{ Params: CalendarParams }>(
    "/api/calendars/:id/objects",
    async (request, reply) => {
      const input = parseInput(createObjectSchema, request.body);
      const created = await fastify.federation.createObject(
        request.params.id,
        input,
      );
      return sendOutcome(reply, created, (object) => object, 201);
    },
  );
}
