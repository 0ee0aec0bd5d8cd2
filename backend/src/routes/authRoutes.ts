// File: authRoutes.ts
import express, { Request, RequestHandler } from 'express';
import type { AuthService } from '../services/AuthService';
import { LoggerService } from '../services/LoggerService';
import { requireUser } from '../middleware/authMiddleware';
import { describeIssues, loginSchema, registerSchema } from '../models/schemas';
import { toPublicUser, type SessionOrigin } from '../models/User';

function originOf(req: Request): SessionOrigin {
  return {
    userAgent: req.get('user-agent') ?? null,
    ipAddress: req.ip ?? null,
  };
}

export function createAuthRoutes(authService: AuthService, authenticate: RequestHandler, logger: LoggerService) {
  const router = express.Router();

  /**
   * User registration; the new account is logged in straight away
   * POST /auth/register
   */
  router.post('/register', async (req, res) => {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Missing required fields', detail: describeIssues(parsed.error) });
    }

    try {
      const { username, password, email } = parsed.data;
      const result = await authService.registerUser(username, password, email);

      if (!result.success) {
        if (result.error === 'invalid_username') {
          return res.status(400).json({ error: 'Invalid username' });
        }
        if (result.error === 'email_taken') {
          return res.status(409).json({ error: 'Email already registered' });
        }
        return res.status(409).json({ error: 'Username already registered' });
      }

      const accessToken = await authService.openSession(result.user, originOf(req));
      return res.status(201).json({
        access_token: accessToken,
        token_type: 'bearer',
        username: result.user.username,
      });
    } catch (error) {
      logger.error('Registration error', error);
      return res.status(500).json({ error: 'Registration failed' });
    }
  });

  /**
   * User login, JSON or form-encoded
   * POST /auth/login
   */
  router.post('/login', async (req, res) => {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Missing username or password', detail: describeIssues(parsed.error) });
    }

    try {
      const token = await authService.loginUser(parsed.data, originOf(req));
      if (!token) {
        return res.status(401).json({ error: 'Incorrect username or password' });
      }
      return res.json({ access_token: token, token_type: 'bearer', username: parsed.data.username });
    } catch (error) {
      logger.error('Login error', error);
      return res.status(500).json({ error: 'Login failed' });
    }
  });

  /**
   * POST /auth/logout
   */
  router.post('/logout', authenticate, async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;

    try {
      await authService.logout(user.username);
      return res.json({ message: 'Successfully logged out' });
    } catch (error) {
      logger.error('Logout error', error);
      return res.status(500).json({ error: 'Logout failed' });
    }
  });

  /**
   * Get current user profile
   * GET /auth/me
   */
  router.get('/me', authenticate, async (req, res) => {
    const identity = requireUser(req, res);
    if (!identity) return;

    try {
      const user = await authService.getUser(identity.username);
      if (!user) {
        return res.status(404).json({ error: 'User not found' });
      }
      return res.json(toPublicUser(user));
    } catch (error) {
      logger.error('Get profile error', error);
      return res.status(500).json({ error: 'Failed to get profile' });
    }
  });

  return router;
}
