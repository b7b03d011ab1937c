import type { FastifyInstance, FastifyRequest } from "fastify";
import { startTimer } from "../logger.js";
import type { RequestRecorder } from "../reliability/request-recorder.js";

/** Endpoint name for requests that matched no route */
export const UNMATCHED_ENDPOINT = "unmatched";

/**
 * Paths served by the status surface itself. Recording them would let
 * dashboard polling skew the SLIs it reports.
 */
export function isStatusPath(url: string): boolean {
  const path = url.split("?")[0] ?? url;
  return path.startsWith("/sre/") || path === "/metrics" || path === "/health";
}

/**
 * Feed every completed request into the recorder, keyed by route pattern
 * (`/users/:id`, not `/users/42`).
 */
export function registerRequestRecording(app: FastifyInstance, recorder: RequestRecorder): void {
  const timers = new WeakMap<FastifyRequest, () => number>();

  app.addHook("onRequest", async (request) => {
    if (isStatusPath(request.url)) {
      return;
    }
    timers.set(request, startTimer());
  });

  app.addHook("onResponse", async (request, reply) => {
    const elapsed = timers.get(request);
    if (elapsed === undefined) {
      return;
    }
    timers.delete(request);

    const endpoint = request.is404 ? UNMATCHED_ENDPOINT : (request.routeOptions.url ?? UNMATCHED_ENDPOINT);
    recorder.record(endpoint, reply.statusCode, elapsed());
  });
}
