import { Router } from 'express';
import { z } from 'zod';
import { buildDashboard, collectData } from '../../src/dashboard/stats.js';
import { ValidationError } from '../../src/store/errors.js';
import { sendError } from '../http.js';
import { requireSession, verifyAuth } from '../middleware/auth.js';
import type { AppServices } from '../services.js';

const askSchema = z.object({
  query: z.string().trim().min(1, 'Query is required').max(2000, 'Query too long'),
});

export function insightRoutes({ store, sessions, assistant }: AppServices): Router {
  const router = Router();
  const auth = verifyAuth(sessions);

  router.get('/dashboard', auth, (_req, res) => {
    try {
      res.json(buildDashboard(collectData(store)));
    } catch (error) {
      sendError(res, error, 'build dashboard');
    }
  });

  router.post('/assistant', auth, async (req, res) => {
    try {
      const session = requireSession(req);
      const parsed = askSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map(i => i.message).join('; '));
      }
      const { query } = parsed.data;
      const reply = await assistant.ask(query);
      session.chatHistory.push({ role: 'user', content: query }, { role: 'assistant', content: reply.answer });
      res.json(reply);
    } catch (error) {
      sendError(res, error, 'answer question');
    }
  });

  router.get('/assistant/history', auth, (req, res) => {
    try {
      res.json({ history: requireSession(req).chatHistory });
    } catch (error) {
      sendError(res, error, 'fetch chat history');
    }
  });

  router.delete('/assistant/history', auth, (req, res) => {
    try {
      requireSession(req).chatHistory = [];
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'clear chat history');
    }
  });

  return router;
}
