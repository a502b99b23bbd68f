import type { FastifyReply } from 'fastify';
import type { RemoteGameSource } from '../games/remoteSource';
import type { SyncRegistry } from '../jobs/registry';
import type { Logger } from '../services/logger';
import { AuthError, LedgerError, StoreCorruptError } from '../util/errors';

export type RouteDeps = {
  dataDir: string;
  /** Session token used when a request does not bring its own. */
  defaultToken?: string;
  fetchWindow: number;
  concurrency: number;
  minCountrySamples: number;
  sourceFor: (token: string) => RemoteGameSource;
  registry: SyncRegistry;
  logger: Logger;
};

/** Maps store and session failures to HTTP answers; anything else is a 500. */
export function sendFailure(reply: FastifyReply, err: unknown) {
  if (err instanceof AuthError) {
    return reply.code(401).send({ error: 'Session rejected', code: err.code, message: err.message });
  }
  if (err instanceof StoreCorruptError) {
    return reply.code(500).send({ error: 'Game store unreadable', code: err.code, message: err.message });
  }
  if (err instanceof LedgerError) {
    return reply.code(500).send({ error: 'Internal error', code: err.code, message: err.message });
  }
  return reply.code(500).send({ error: 'Internal error' });
}
