import type { NextFunction, Request, Response } from 'express';
import type { ErrorResponse } from './errorHandler.js';

const BEARER_PREFIX = 'Bearer ';

/**
 * Extract the caller's access token from the Authorization header.
 * The token is not checked here: the identity provider rejects bad or
 * expired tokens on the call that uses it.
 */
export function requireAccessToken(req: Request, res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
    const response: ErrorResponse = {
      code: 'UNAUTHORIZED',
      message: 'Missing or invalid authorization header',
    };
    res.status(401).json(response);
    return;
  }

  const token = authHeader.slice(BEARER_PREFIX.length).trim();
  if (!token) {
    const response: ErrorResponse = {
      code: 'UNAUTHORIZED',
      message: 'Missing or invalid authorization header',
    };
    res.status(401).json(response);
    return;
  }

  req.accessToken = token;
  next();
}

/**
 * Token stored by requireAccessToken. Throws when the route forgot the middleware.
 */
export function getAccessToken(req: Request): string {
  if (!req.accessToken) {
    throw new Error('requireAccessToken must run before this handler');
  }
  return req.accessToken;
}
