import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import { timingSafeEqual } from 'crypto';
import { z } from 'zod';

export const MAX_USERNAME_LENGTH = 256;

const UsernameParamsSchema = z.object({
  username: z.string().min(1).max(MAX_USERNAME_LENGTH),
});

/**
 * Constant-time string comparison to prevent timing attacks
 */
function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

const accountRoutes: FastifyPluginAsync = async (fastify) => {
  const { statusService, config, gateLogger: logger } = fastify;
  const configuredKey = config.server.api_key;

  // API key authentication hook
  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    // No API key configured = development mode (allow all)
    if (!configuredKey) return;

    const apiKey = request.headers['x-api-key'];
    if (typeof apiKey !== 'string' || !safeCompare(apiKey, configuredKey)) {
      return reply.code(401).send({ error: 'Unauthorized' });
    }
  });

  fastify.get<{ Params: { username: string } }>(
    '/api/accounts/:username',
    async (request, reply) => {
      const params = UsernameParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.code(400).send({ error: 'Invalid username' });
      }

      const account = await statusService.resolve(params.data.username);
      logger.debug({ username: account.username, status: account.status }, 'Account status served');
      return account;
    }
  );
};

export default accountRoutes;
