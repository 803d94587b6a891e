import { Router } from 'express';
import { z } from 'zod';
import { contextOf } from '../../src/auth/sessions.js';
import { AuthenticationError, ValidationError } from '../../src/store/errors.js';
import { sendError } from '../http.js';
import { bearerToken, requireRole, requireSession, verifyAuth } from '../middleware/auth.js';
import type { AppServices } from '../services.js';

const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export function authRoutes({ config, users, sessions }: AppServices): Router {
  const router = Router();
  const auth = verifyAuth(sessions);

  router.post('/auth/login', (req, res) => {
    try {
      const parsed = loginSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map(i => i.message).join('; '));
      }
      const { username, password } = parsed.data;
      const user = users.authenticate(username, password);
      if (!user) throw new AuthenticationError('Invalid credentials');

      const session = sessions.create(user.username, user.role);
      console.log(`[auth] ${user.username} signed in (${user.role})`);
      res.json({ token: session.token, user: { username: user.username, role: user.role } });
    } catch (error) {
      sendError(res, error, 'sign in');
    }
  });

  // Read-only guest session, only when enabled
  router.post('/auth/demo', (_req, res) => {
    if (!config.demoMode) {
      return res.status(404).json({ error: 'Demo mode is disabled' });
    }
    const session = sessions.create('demo', 'Viewer');
    res.json({ token: session.token, user: { username: 'demo', role: 'Viewer' } });
  });

  router.post('/auth/logout', auth, (req, res) => {
    const token = bearerToken(req);
    if (token) sessions.destroy(token);
    res.json({ success: true });
  });

  router.get('/auth/me', auth, (req, res) => {
    try {
      const session = requireSession(req);
      res.json({ user: { username: session.username, role: session.role } });
    } catch (error) {
      sendError(res, error, 'fetch user');
    }
  });

  router.get('/users', auth, requireRole(['Administrator'], 'list users'), (_req, res) => {
    res.json({ users: users.listUsers() });
  });

  router.post('/users', auth, (req, res) => {
    try {
      const session = requireSession(req);
      const user = users.createUser(req.body, contextOf(session));
      res.status(201).json({ user });
    } catch (error) {
      sendError(res, error, 'create user');
    }
  });

  return router;
}
