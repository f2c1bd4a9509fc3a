import { Router } from 'express';
import { z } from 'zod';
import type { IdentityProvider } from '../../../application/auth/identityProvider.js';
import { GetUserUseCase } from '../../../application/auth/getUser.js';
import { LoginUseCase, LogoutUseCase, RefreshTokenUseCase } from '../../../application/auth/login.js';
import {
  ChangePasswordUseCase,
  ConfirmForgotPasswordUseCase,
  ForgotPasswordUseCase,
} from '../../../application/auth/password.js';
import {
  RegisterUseCase,
  ResendConfirmationCodeUseCase,
  VerifyAccountUseCase,
} from '../../../application/auth/register.js';
import { USER_ROLES, withoutPrivateAttributes } from '../../../domain/auth/user.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { getAccessToken, requireAccessToken } from '../middleware/auth.js';
import { createSigninRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /api/auth/signup:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new account
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password, fullName, role, nationalId]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *               fullName: { type: string }
 *               role: { type: string, enum: [patient, doctor] }
 *               nationalId: { type: string }
 *               professionalId: { type: string }
 *     responses:
 *       201:
 *         description: Account created, confirmation code sent
 *       400:
 *         description: Validation error or password policy not met
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/verify:
 *   post:
 *     tags: [Auth]
 *     summary: Confirm an account with the emailed code
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, code]
 *             properties:
 *               email: { type: string, format: email }
 *               code: { type: string }
 *     responses:
 *       200:
 *         description: Account confirmed
 *       400:
 *         description: Code wrong or expired
 *       403:
 *         description: Account cannot be confirmed in its current state
 *       404:
 *         description: Unknown account
 *
 * /api/auth/resend-code:
 *   post:
 *     tags: [Auth]
 *     summary: Send a new confirmation code
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string, format: email }
 *     responses:
 *       200:
 *         description: Code sent
 *       404:
 *         description: Unknown account
 *       429:
 *         description: Provider attempt limit reached
 *
 * /api/auth/users/{email}:
 *   get:
 *     tags: [Users]
 *     summary: Look up an account
 *     description: >
 *       Internal use only. Deploy behind a network boundary: the route is
 *       unauthenticated and reveals whether an account exists. The national
 *       id attribute (custom:cpf) is left out of the response.
 *     parameters:
 *       - in: path
 *         name: email
 *         required: true
 *         schema: { type: string, format: email }
 *     responses:
 *       200:
 *         description: Account record
 *       404:
 *         description: Unknown account
 *
 * /api/auth/signin:
 *   post:
 *     tags: [Session]
 *     summary: Sign in and receive tokens
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
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       403:
 *         description: Account not confirmed
 *       404:
 *         description: Unknown account
 *
 * /api/auth/forgot-password:
 *   post:
 *     tags: [Password]
 *     summary: Send a password reset code
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string, format: email }
 *     responses:
 *       200:
 *         description: Code delivery details
 *       404:
 *         description: Unknown account
 *
 * /api/auth/confirm-forgot-password:
 *   post:
 *     tags: [Password]
 *     summary: Set a new password with a reset code
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, code, newPassword]
 *             properties:
 *               email: { type: string, format: email }
 *               code: { type: string }
 *               newPassword: { type: string }
 *     responses:
 *       200:
 *         description: Password reset
 *       400:
 *         description: Code wrong or expired
 *
 * /api/auth/change-password:
 *   post:
 *     tags: [Password]
 *     summary: Change the signed-in user's password
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [oldPassword, newPassword]
 *             properties:
 *               oldPassword: { type: string }
 *               newPassword: { type: string }
 *     responses:
 *       200:
 *         description: Password changed
 *       401:
 *         description: Wrong password or invalid token
 *       429:
 *         description: Provider attempt limit reached
 *
 * /api/auth/refresh-token:
 *   post:
 *     tags: [Session]
 *     summary: Exchange a refresh token for new access and id tokens
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [refreshToken]
 *             properties:
 *               refreshToken: { type: string }
 *     responses:
 *       200:
 *         description: New tokens (refreshToken is null)
 *       429:
 *         description: Provider attempt limit reached
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Session]
 *     summary: Revoke every token issued to the caller
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       204:
 *         description: Signed out
 *       401:
 *         description: Invalid or expired access token
 *       429:
 *         description: Too many requests
 */

const emailSchema = z.string().email();

const signupBodySchema = z.object({
  email: emailSchema,
  password: z.string().min(1),
  fullName: z.string().min(1),
  role: z.enum(USER_ROLES),
  nationalId: z.string().min(1),
  professionalId: z.string().min(1).optional(),
});

const verifyBodySchema = z.object({
  email: emailSchema,
  code: z.string().min(1),
});

const emailBodySchema = z.object({
  email: emailSchema,
});

const emailParamsSchema = z.object({
  email: emailSchema,
});

const signinBodySchema = z.object({
  email: emailSchema,
  password: z.string().min(1),
});

const confirmForgotPasswordBodySchema = z.object({
  email: emailSchema,
  code: z.string().min(1),
  newPassword: z.string().min(1),
});

const changePasswordBodySchema = z.object({
  oldPassword: z.string().min(1),
  newPassword: z.string().min(1),
});

const refreshTokenBodySchema = z.object({
  refreshToken: z.string().min(1),
});

export function createAuthRoutes(identityProvider: IdentityProvider) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(identityProvider);
  const verifyAccountUseCase = new VerifyAccountUseCase(identityProvider);
  const resendCodeUseCase = new ResendConfirmationCodeUseCase(identityProvider);
  const getUserUseCase = new GetUserUseCase(identityProvider);
  const loginUseCase = new LoginUseCase(identityProvider);
  const refreshTokenUseCase = new RefreshTokenUseCase(identityProvider);
  const logoutUseCase = new LogoutUseCase(identityProvider);
  const forgotPasswordUseCase = new ForgotPasswordUseCase(identityProvider);
  const confirmForgotPasswordUseCase = new ConfirmForgotPasswordUseCase(identityProvider);
  const changePasswordUseCase = new ChangePasswordUseCase(identityProvider);

  router.post(
    '/signup',
    validate({ body: signupBodySchema }),
    asyncHandler(async (req, res) => {
      const body = signupBodySchema.parse(req.body);
      const result = await registerUseCase.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/verify',
    validate({ body: verifyBodySchema }),
    asyncHandler(async (req, res) => {
      const body = verifyBodySchema.parse(req.body);
      const result = await verifyAccountUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/resend-code',
    validate({ body: emailBodySchema }),
    asyncHandler(async (req, res) => {
      const body = emailBodySchema.parse(req.body);
      const result = await resendCodeUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.get(
    '/users/:email',
    validate({ params: emailParamsSchema }),
    asyncHandler(async (req, res) => {
      const params = emailParamsSchema.parse(req.params);
      const result = await getUserUseCase.execute(params);
      res.status(200).json(withoutPrivateAttributes(result));
    })
  );

  router.post(
    '/signin',
    createSigninRateLimiter(),
    validate({ body: signinBodySchema }),
    asyncHandler(async (req, res) => {
      const body = signinBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/forgot-password',
    validate({ body: emailBodySchema }),
    asyncHandler(async (req, res) => {
      const body = emailBodySchema.parse(req.body);
      const result = await forgotPasswordUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/confirm-forgot-password',
    validate({ body: confirmForgotPasswordBodySchema }),
    asyncHandler(async (req, res) => {
      const body = confirmForgotPasswordBodySchema.parse(req.body);
      const result = await confirmForgotPasswordUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/change-password',
    requireAccessToken,
    validate({ body: changePasswordBodySchema }),
    asyncHandler(async (req, res) => {
      const body = changePasswordBodySchema.parse(req.body);
      const result = await changePasswordUseCase.execute({
        ...body,
        accessToken: getAccessToken(req),
      });
      res.status(200).json(result);
    })
  );

  router.post(
    '/refresh-token',
    validate({ body: refreshTokenBodySchema }),
    asyncHandler(async (req, res) => {
      const body = refreshTokenBodySchema.parse(req.body);
      const result = await refreshTokenUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/logout',
    requireAccessToken,
    asyncHandler(async (req, res) => {
      await logoutUseCase.execute({ accessToken: getAccessToken(req) });
      res.status(204).send();
    })
  );

  return router;
}
