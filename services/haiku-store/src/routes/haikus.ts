import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { config } from '../config';
import type { HaikuStorage } from '../contracts/haikuStorage';
import { ValidationError } from '../errors';
import { serializeHaiku } from '../models/haiku';

const { defaultLimit, maxLimit, subjectMaxLength } = config.limits;

// ---------- Schemas ----------
// query-string numbers arrive as strings; coerce before validating
const limitSchema = z
  .preprocess((v) => (typeof v === 'string' ? Number(v) : v), z.number().int().positive().max(maxLimit))
  .optional();

const offsetSchema = z
  .preprocess((v) => (typeof v === 'string' ? Number(v) : v), z.number().int().nonnegative())
  .optional();

const saveSchema = z.object({
  subject: z.string().trim().min(1, 'subject required').max(subjectMaxLength),
  text: z.string().trim().min(1, 'text required'),
  user_id: z.string().min(1).optional(),
});

const listQuerySchema = z.object({
  limit: limitSchema,
  offset: offsetSchema,
});

const searchQuerySchema = z.object({
  q: z.string().default(''),
  limit: limitSchema,
});

const idParamsSchema = z.object({
  id: z.string().min(1),
});

// ---------- Helpers ----------
function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: error.flatten() });
}

function validationFailed(reply: FastifyReply, err: ValidationError) {
  return reply.code(400).send({ error: { formErrors: [err.message], fieldErrors: {} } });
}

// ---------- Routes ----------
export async function registerHaikuRoutes(app: FastifyInstance, storage: HaikuStorage) {
  app.post('/haikus', async (req, reply) => {
    const parsed = saveSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    if (!storage.isAvailable()) {
      return reply.code(503).send({ error: 'storage_unavailable' });
    }

    const { subject, text, user_id } = parsed.data;
    try {
      const saved = await storage.saveHaiku(subject, text, user_id);
      if (!saved) return reply.code(500).send({ error: 'save_failed' });
      return reply.code(201).send(serializeHaiku(saved));
    } catch (err) {
      if (err instanceof ValidationError) return validationFailed(reply, err);
      throw err;
    }
  });

  app.get('/haikus', async (req, reply) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { limit = defaultLimit, offset = 0 } = parsed.data;
    const haikus = await storage.getRecentHaikus(limit, offset);
    return reply.send({ haikus: haikus.map(serializeHaiku) });
  });

  app.get('/haikus/search', async (req, reply) => {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { q, limit = defaultLimit } = parsed.data;
    const haikus = await storage.searchHaikus(q, limit);
    return reply.send({ haikus: haikus.map(serializeHaiku) });
  });

  app.get('/haikus/count', async (_req, reply) => {
    const count = await storage.getTotalCount();
    return reply.send({ count });
  });

  app.get('/haikus/:id', async (req, reply) => {
    const parsed = idParamsSchema.safeParse(req.params);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const haiku = await storage.getHaikuById(parsed.data.id);
    if (!haiku) return reply.code(404).send({ error: 'not_found' });
    return reply.send(serializeHaiku(haiku));
  });

  app.delete('/haikus/:id', async (req, reply) => {
    const parsed = idParamsSchema.safeParse(req.params);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const ok = await storage.deleteHaiku(parsed.data.id);
    return reply.send({ ok });
  });
}
