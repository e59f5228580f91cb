/**
 * Object API Routes
 *
 * Calendar objects addressed by their composite identifier, or by bare UID
 * once the federation has seen them.
 */

import type { FastifyInstance } from "fastify";
import { parseInput, sendOutcome } from "../http.js";
import { moveSchema, objectPatchSchema } from "../schemas.js";

interface ObjectParams {
  id: string;
}

interface UidParams {
  uid: string;
}

export async function registerObjectRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  fastify.get<{ Params: UidParams }>(
    "/api/objects/by-uid/:uid",
    async (request, reply) => {
      const found = await fastify.federation.findObjectByUid(request.params.uid);
      return sendOutcome(reply, found, (object) => object);
    },
  );

  fastify.get<{ Params: ObjectParams }>(
    "/api/objects/:id",
    async (request, reply) => {
      const found = await fastify.federation.findObject(request.params.id);
      return sendOutcome(reply, found, (object) => object);
    },
  );

  fastify.patch<{ Params: ObjectParams }>(
    "/api/objects/:id",
    async (request, reply) => {
      const patch = parseInput(objectPatchSchema, request.body);
      const edited = await fastify.federation.editObject(
        request.params.id,
        patch,
      );
      return sendOutcome(reply, edited, () => undefined);
    },
  );

  fastify.delete<{ Params: ObjectParams }>(
    "/api/objects/:id",
    async (request, reply) => {
      const deleted = await fastify.federation.deleteObject(request.params.id);
      return sendOutcome(reply, deleted, (mode) => ({ mode }));
    },
  );

  /**
   * POST /api/objects/:id/move
   *
   * Move into `destination` (a calendar identifier), across backends if
   * needed. Responds with the object's new identifier.
   */
  fastify.post<{ Params: ObjectParams }>(
    "/api/objects/:id/move",
    async (request, reply) => {
      const { destination } = parseInput(moveSchema, request.body);
      const moved = await fastify.engine.moveObject(
        request.params.id,
        destination,
      );
      return sendOutcome(reply, moved, (id) => ({ id }));
    },
  );
}
