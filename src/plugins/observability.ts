import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";
import { getRequestId } from "../utils/request-id.js";

declare module "fastify" {
  interface FastifyRequest {
    startTime?: number;
  }
}

export interface ObservabilityOptions {
  /** Fraction of successful requests logged at info level (errors always logged) */
  infoSampleRate: number;
  /** Include error stacks in request error logs */
  logStack: boolean;
  /** Injected for tests */
  random?: () => number;
}

/**
 * Observability Plugin
 *
 * Request completion logging with sampling, request ID propagation
 * and duration tracking.
 */
async function observabilityPlugin(fastify: FastifyInstance, options: ObservabilityOptions) {
  const random = options.random ?? Math.random;

  function shouldSampleInfoLog(statusCode: number): boolean {
    if (statusCode >= 400) return true;
    return random() < options.infoSampleRate;
  }

  fastify.addHook("onRequest", async (request: FastifyRequest) => {
    if (request.startTime === undefined) {
      request.startTime = Date.now();
    }
  });

  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = reply.statusCode;
    if (!shouldSampleInfoLog(statusCode)) {
      return;
    }

    const logData = {
      request_id: getRequestId(request),
      method: request.method,
      url: request.url,
      status: statusCode,
      duration_ms: Date.now() - (request.startTime ?? Date.now()),
      user_agent: request.headers["user-agent"],
    };

    if (statusCode >= 500) {
      fastify.log.error(logData, "Request completed with server error");
    } else if (statusCode >= 400) {
      fastify.log.warn(logData, "Request completed with client error");
    } else {
      fastify.log.info(logData, "Request completed");
    }
  });

  fastify.addHook("onError", async (request: FastifyRequest, _reply: FastifyReply, error: Error) => {
    fastify.log.error(
      {
        request_id: getRequestId(request),
        method: request.method,
        url: request.url,
        duration_ms: Date.now() - (request.startTime ?? Date.now()),
        error: {
          name: error.name,
          message: error.message,
          ...(options.logStack ? { stack: error.stack } : {}),
        },
      },
      "Request error"
    );
  });
}

export default fp(observabilityPlugin, {
  name: "observability",
  fastify: "5.x",
});
