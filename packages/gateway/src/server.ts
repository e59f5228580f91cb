import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import { ZodError } from "zod";
import {
  FederationError,
  type CalendarFederation,
  type MergeEngine,
} from "@calfed/core";
import { describeZodError, errorBody, statusFor } from "./http.js";
import { registerCalendarRoutes } from "./routes/calendars.js";
import { registerObjectRoutes } from "./routes/objects.js";

export interface ServerOptions {
  federation: CalendarFederation;
  engine: MergeEngine;
  /** pino logger shared with the federation; logging is off when omitted */
  logger?: FastifyBaseLogger;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    federation: CalendarFederation;
    engine: MergeEngine;
  }
}

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const fastify: FastifyInstance = Fastify({
    logger: options.logger ?? false,
  });

  fastify.decorate("federation", options.federation);
  fastify.decorate("engine", options.engine);

  // Identifier errors are thrown by the federation; map them like outcomes
  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof FederationError) {
      return reply.code(statusFor(error.code)).send(errorBody(error));
    }
    if (error instanceof ZodError) {
      return reply
        .code(400)
        .send({ error: describeZodError(error), code: "INVALID_REQUEST" });
    }
    const status = error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error(error);
    }
    return reply.code(status).send({ error: error.message, code: error.code });
  });

  await registerCalendarRoutes(fastify);
  await registerObjectRoutes(fastify);

  return fastify;
}
