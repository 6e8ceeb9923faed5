import { Router } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import { GetProfileUseCase, UpdateProfileUseCase } from '../../../application/auth/profile.js';
import type { PasswordHasher } from '../../../domain/auth/password.js';
import type { TokenCodec } from '../../../domain/auth/token.js';
import type { UserSessions } from '../../../domain/auth/user.js';
import { authMiddleware, requireAuth } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * components:
 *   schemas:
 *     PublicUser:
 *       type: object
 *       required: [id, name, email]
 *       properties:
 *         id: { type: string, format: uuid }
 *         name: { type: string }
 *         email: { type: string, format: email }
 *
 * /auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, email, password]
 *             properties:
 *               name: { type: string, maxLength: 100 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       200:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/PublicUser' }
 *       400:
 *         description: Email already registered (DUPLICATE_EMAIL)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       422:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange credentials for a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 access_token: { type: string }
 *                 token_type: { type: string, example: bearer }
 *       401:
 *         description: Invalid credentials (INVALID_CREDENTIALS)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Current user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/PublicUser' }
 *       401:
 *         description: Missing, malformed, invalid or expired token, or user gone
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Auth]
 *     summary: Update name and/or email of the current user
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               name: { type: string, maxLength: 100 }
 *               email: { type: string, format: email }
 *     responses:
 *       200:
 *         description: Updated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/PublicUser' }
 *       400:
 *         description: Email belongs to another user (DUPLICATE_EMAIL)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const nameSchema = z.string().trim().min(1).max(100);

const registerBodySchema = z.object({
  name: nameSchema,
  email: z.string().email(),
  password: z.string().min(8),
});

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

const updateProfileBodySchema = z.object({
  name: nameSchema.optional(),
  email: z.string().email().optional(),
});

export interface AuthRouteDependencies {
  sessions: UserSessions;
  hasher: PasswordHasher;
  tokens: TokenCodec;
}

export function createAuthRoutes({ sessions, hasher, tokens }: AuthRouteDependencies) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(sessions, hasher);
  const loginUseCase = new LoginUseCase(sessions, hasher, tokens);
  const getProfileUseCase = new GetProfileUseCase(sessions);
  const updateProfileUseCase = new UpdateProfileUseCase(sessions);
  const requireToken = authMiddleware(new AuthenticateUseCase(tokens));

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const user = await registerUseCase.execute(body);
      res.status(200).json(user);
    })
  );

  router.post(
    '/login',
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.get(
    '/me',
    requireToken,
    asyncHandler(async (req, res) => {
      const { userId } = requireAuth(req);
      res.status(200).json(await getProfileUseCase.execute(userId));
    })
  );

  router.put(
    '/me',
    requireToken,
    validate({ body: updateProfileBodySchema }),
    asyncHandler(async (req, res) => {
      const { userId } = requireAuth(req);
      const body = updateProfileBodySchema.parse(req.body);
      const user = await updateProfileUseCase.execute({ userId, ...body });
      res.status(200).json(user);
    })
  );

  return router;
}
