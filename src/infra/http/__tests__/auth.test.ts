import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import express from 'express';
import type { IdentityProvider } from '../../../application/auth/identityProvider.js';
import {
  AUTH_ERROR_KINDS,
  InvalidCredentialsError,
  UserAlreadyExistsError,
  UserNotConfirmedError,
  createAuthError,
} from '../../../domain/auth/errors.js';
import { createLogger } from '../../logger.js';
import { AUTH_ERROR_HTTP, errorHandler } from '../middleware/errorHandler.js';
import { createAuthRoutes } from '../routes/auth.js';

function createFakeIdentityProvider() {
  return {
    signup: vi.fn<IdentityProvider['signup']>(),
    verifyAccount: vi.fn<IdentityProvider['verifyAccount']>(),
    resendConfirmationCode: vi.fn<IdentityProvider['resendConfirmationCode']>(),
    getUser: vi.fn<IdentityProvider['getUser']>(),
    signin: vi.fn<IdentityProvider['signin']>(),
    forgotPassword: vi.fn<IdentityProvider['forgotPassword']>(),
    confirmForgotPassword: vi.fn<IdentityProvider['confirmForgotPassword']>(),
    changePassword: vi.fn<IdentityProvider['changePassword']>(),
    refreshAccessToken: vi.fn<IdentityProvider['refreshAccessToken']>(),
    logout: vi.fn<IdentityProvider['logout']>(),
  } satisfies IdentityProvider;
}

const signupBody = {
  email: 'a@x.com',
  password: 'Abc12345!',
  fullName: 'Ana Souza',
  role: 'patient',
  nationalId: '123.456.789-00',
};

describe('Auth API', () => {
  let identityProvider: ReturnType<typeof createFakeIdentityProvider>;
  let app: express.Application;

  beforeEach(() => {
    identityProvider = createFakeIdentityProvider();
    app = express();
    app.use(express.json());
    app.use('/api/auth', createAuthRoutes(identityProvider));
    app.use(errorHandler(createLogger({ logLevel: 'silent', nodeEnv: 'test' })));
  });

  describe('POST /api/auth/signup', () => {
    it('should register a new user', async () => {
      identityProvider.signup.mockResolvedValue({
        userId: 'uuid-1',
        userConfirmed: false,
        codeDeliveryDestination: 'a***@x.com',
        codeDeliveryChannel: 'EMAIL',
      });

      const response = await request(app).post('/api/auth/signup').send(signupBody);

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        userId: 'uuid-1',
        userConfirmed: false,
        codeDeliveryDestination: 'a***@x.com',
        codeDeliveryChannel: 'EMAIL',
      });
      expect(identityProvider.signup).toHaveBeenCalledWith(signupBody);
    });

    it('should reject an unknown role', async () => {
      const response = await request(app)
        .post('/api/auth/signup')
        .send({ ...signupBody, role: 'admin' });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
      expect(response.body).toHaveProperty('message', 'Validation failed');
      expect(identityProvider.signup).not.toHaveBeenCalled();
    });

    it('should reject an invalid email', async () => {
      const response = await request(app)
        .post('/api/auth/signup')
        .send({ ...signupBody, email: 'invalid-email' });

      expect(response.status).toBe(400);
      expect(response.body.details.issues).toContainEqual({
        path: 'email',
        message: 'Invalid email',
      });
    });

    it('should reject a duplicate email', async () => {
      identityProvider.signup.mockRejectedValue(new UserAlreadyExistsError());

      const response = await request(app).post('/api/auth/signup').send(signupBody);

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        code: 'USER_ALREADY_EXISTS',
        message: 'User already exists.',
      });
    });
  });

  describe('POST /api/auth/verify', () => {
    it('should pass the code through', async () => {
      identityProvider.verifyAccount.mockResolvedValue({});

      const response = await request(app)
        .post('/api/auth/verify')
        .send({ email: 'a@x.com', code: '123456' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({});
      expect(identityProvider.verifyAccount).toHaveBeenCalledWith({
        email: 'a@x.com',
        code: '123456',
      });
    });
  });

  describe('POST /api/auth/resend-code', () => {
    it('should resend to the given email', async () => {
      identityProvider.resendConfirmationCode.mockResolvedValue({
        CodeDeliveryDetails: { Destination: 'a***@x.com', DeliveryMedium: 'EMAIL' },
      });

      const response = await request(app).post('/api/auth/resend-code').send({ email: 'a@x.com' });

      expect(response.status).toBe(200);
      expect(identityProvider.resendConfirmationCode).toHaveBeenCalledWith('a@x.com');
    });
  });

  describe('GET /api/auth/users/:email', () => {
    it('should return the user record', async () => {
      identityProvider.getUser.mockResolvedValue({
        username: 'uuid-1',
        attributes: [{ name: 'email', value: 'a@x.com' }],
        createdAt: '2024-03-01T12:00:00.000Z',
        lastModifiedAt: '2024-03-02T08:30:00.000Z',
        status: 'CONFIRMED',
        enabled: true,
      });

      const response = await request(app).get('/api/auth/users/a%40x.com');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('status', 'CONFIRMED');
      expect(identityProvider.getUser).toHaveBeenCalledWith('a@x.com');
    });

    it('should leave the national id out of the response', async () => {
      identityProvider.getUser.mockResolvedValue({
        username: 'uuid-1',
        attributes: [
          { name: 'email', value: 'a@x.com' },
          { name: 'custom:cpf', value: '123.456.789-00' },
          { name: 'custom:role', value: 'patient' },
        ],
        createdAt: '2024-03-01T12:00:00.000Z',
        lastModifiedAt: '2024-03-02T08:30:00.000Z',
        status: 'CONFIRMED',
        enabled: true,
      });

      const response = await request(app).get('/api/auth/users/a%40x.com');

      expect(response.status).toBe(200);
      expect(response.body.attributes).toEqual([
        { name: 'email', value: 'a@x.com' },
        { name: 'custom:role', value: 'patient' },
      ]);
    });
  });

  describe('POST /api/auth/signin', () => {
    it('should return the tokens', async () => {
      identityProvider.signin.mockResolvedValue({
        accessToken: 'access-token',
        tokenType: 'Bearer',
        expiresIn: 3600,
        refreshToken: 'refresh-token',
        idToken: 'id-token',
      });

      const response = await request(app)
        .post('/api/auth/signin')
        .send({ email: 'a@x.com', password: 'Abc12345!' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        accessToken: 'access-token',
        tokenType: 'Bearer',
        expiresIn: 3600,
        refreshToken: 'refresh-token',
        idToken: 'id-token',
      });
    });

    it('should reject a wrong password', async () => {
      identityProvider.signin.mockRejectedValue(new InvalidCredentialsError());

      const response = await request(app)
        .post('/api/auth/signin')
        .send({ email: 'a@x.com', password: 'wrong-password' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'INVALID_CREDENTIALS',
        message: 'Incorrect username or password.',
      });
    });

    it('should reject an unconfirmed account', async () => {
      identityProvider.signin.mockRejectedValue(new UserNotConfirmedError());

      const response = await request(app)
        .post('/api/auth/signin')
        .send({ email: 'a@x.com', password: 'Abc12345!' });

      expect(response.status).toBe(403);
      expect(response.body).toEqual({
        code: 'USER_NOT_CONFIRMED',
        message: 'Please verify your account.',
      });
    });

    it('should enforce rate limit on signin', async () => {
      identityProvider.signin.mockRejectedValue(new InvalidCredentialsError());

      for (let attempt = 0; attempt < 10; attempt++) {
        const response = await request(app)
          .post('/api/auth/signin')
          .send({ email: 'a@x.com', password: 'wrong-password' });
        expect(response.status).toBe(401);
      }

      const response = await request(app)
        .post('/api/auth/signin')
        .send({ email: 'a@x.com', password: 'wrong-password' });

      expect(response.status).toBe(429);
      expect(response.body).toHaveProperty('code', 'TOO_MANY_REQUESTS');
      expect(identityProvider.signin).toHaveBeenCalledTimes(10);
    });
  });

  describe('password reset', () => {
    it('should return the code delivery details', async () => {
      identityProvider.forgotPassword.mockResolvedValue({
        destination: 'a***@x.com',
        channel: 'EMAIL',
        attributeName: 'email',
      });

      const response = await request(app)
        .post('/api/auth/forgot-password')
        .send({ email: 'a@x.com' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        destination: 'a***@x.com',
        channel: 'EMAIL',
        attributeName: 'email',
      });
    });

    it('should confirm the new password', async () => {
      identityProvider.confirmForgotPassword.mockResolvedValue({});

      const response = await request(app)
        .post('/api/auth/confirm-forgot-password')
        .send({ email: 'a@x.com', code: '123456', newPassword: 'Xyz98765!' });

      expect(response.status).toBe(200);
      expect(identityProvider.confirmForgotPassword).toHaveBeenCalledWith({
        email: 'a@x.com',
        code: '123456',
        newPassword: 'Xyz98765!',
      });
    });
  });

  describe('POST /api/auth/change-password', () => {
    const body = { oldPassword: 'Abc12345!', newPassword: 'Xyz98765!' };

    it('should reject a request without token', async () => {
      const response = await request(app).post('/api/auth/change-password').send(body);

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      });
      expect(identityProvider.changePassword).not.toHaveBeenCalled();
    });

    it('should reject a non-bearer authorization header', async () => {
      const response = await request(app)
        .post('/api/auth/change-password')
        .set('Authorization', 'Basic dXNlcjpwYXNz')
        .send(body);

      expect(response.status).toBe(401);
    });

    it('should pass the bearer token to the provider', async () => {
      identityProvider.changePassword.mockResolvedValue({});

      const response = await request(app)
        .post('/api/auth/change-password')
        .set('Authorization', 'Bearer access-token')
        .send(body);

      expect(response.status).toBe(200);
      expect(identityProvider.changePassword).toHaveBeenCalledWith({
        oldPassword: 'Abc12345!',
        newPassword: 'Xyz98765!',
        accessToken: 'access-token',
      });
    });
  });

  describe('POST /api/auth/refresh-token', () => {
    it('should return tokens without a refresh token', async () => {
      identityProvider.refreshAccessToken.mockResolvedValue({
        accessToken: 'new-access-token',
        tokenType: 'Bearer',
        expiresIn: 3600,
        refreshToken: null,
        idToken: 'new-id-token',
      });

      const response = await request(app)
        .post('/api/auth/refresh-token')
        .send({ refreshToken: 'refresh-token' });

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('refreshToken', null);
      expect(identityProvider.refreshAccessToken).toHaveBeenCalledWith('refresh-token');
    });
  });

  describe('POST /api/auth/logout', () => {
    it('should sign out with the bearer token', async () => {
      identityProvider.logout.mockResolvedValue({});

      const response = await request(app)
        .post('/api/auth/logout')
        .set('Authorization', 'Bearer access-token');

      expect(response.status).toBe(204);
      expect(identityProvider.logout).toHaveBeenCalledWith('access-token');
    });

    it('should reject a revoked token', async () => {
      identityProvider.logout.mockRejectedValue(
        new InvalidCredentialsError('Invalid access token provided.')
      );

      const response = await request(app)
        .post('/api/auth/logout')
        .set('Authorization', 'Bearer revoked-token');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid access token provided.',
      });
    });
  });

  describe('request bodies', () => {
    it('should answer 400 for truncated JSON', async () => {
      const response = await request(app)
        .post('/api/auth/signin')
        .set('Content-Type', 'application/json')
        .send('{"email": ');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Malformed JSON body',
      });
      expect(identityProvider.signin).not.toHaveBeenCalled();
    });

    it('should answer 413 for a body over the size limit', async () => {
      const response = await request(app)
        .post('/api/auth/signin')
        .send({ email: 'a@x.com', password: 'x'.repeat(200 * 1024) });

      expect(response.status).toBe(413);
      expect(response.body).toEqual({
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Request body too large',
      });
      expect(identityProvider.signin).not.toHaveBeenCalled();
    });
  });

  describe('error mapping', () => {
    it.each(AUTH_ERROR_KINDS)('should map %s to its HTTP status and code', async (kind) => {
      const error = createAuthError(kind);
      identityProvider.getUser.mockRejectedValue(error);

      const response = await request(app).get('/api/auth/users/a%40x.com');

      expect(response.status).toBe(AUTH_ERROR_HTTP[kind].status);
      expect(response.body).toEqual({
        code: AUTH_ERROR_HTTP[kind].code,
        message: error.message,
      });
    });

    it('should hide unexpected errors behind a generic 500', async () => {
      identityProvider.getUser.mockRejectedValue(new Error('socket hang up'));

      const response = await request(app).get('/api/auth/users/a%40x.com');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      });
    });
  });
});
