import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { config } from "./config.js";
import { log } from "./logger.js";
import { registerRequestRecording } from "./http/request-recording.js";
import { registerStatusRoutes } from "./http/routes.js";
import type { ReliabilityContext } from "./reliability/context.js";

/**
 * Build the HTTP server around a reliability context. Routes for the guarded
 * application can be added to the returned instance before `listen`.
 */
export function buildServer(ctx: ReliabilityContext): FastifyInstance {
  const app = Fastify({
    logger: false, // We use our own structured logger
  });

  // Global error handler - prevent stack trace leakage in production
  app.setErrorHandler((error: FastifyError, request, reply) => {
    log.api.error({
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
      requestId: request.id,
    }, "unhandled error");

    const statusCode = error.statusCode ?? 500;

    if (config.NODE_ENV === "production") {
      return reply.status(statusCode).send({
        error: statusCode === 500 ? "Internal server error" : error.message,
        requestId: request.id,
      });
    }

    return reply.status(statusCode).send({
      error: error.message,
      stack: error.stack,
      requestId: request.id,
    });
  });

  registerRequestRecording(app, ctx.recorder);
  registerStatusRoutes(app, ctx);

  return app;
}
