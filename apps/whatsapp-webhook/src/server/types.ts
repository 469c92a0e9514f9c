import type {
  FastifyInstance,
  FastifyTypeProviderDefault,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from 'fastify';

import type { AppLogger } from '../telemetry/logger';

export type GatewayFastifyInstance = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  AppLogger,
  FastifyTypeProviderDefault
>;

export interface RouteRateLimit {
  max: number;
  timeWindow: string | number;
}

declare module 'fastify' {
  interface FastifyRequest {
    /** Exact bytes of the request body, kept for signature checks. */
    rawBody?: Buffer;
  }
}
