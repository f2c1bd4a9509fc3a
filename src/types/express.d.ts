declare global {
  namespace Express {
    interface Request {
      /** Bearer token forwarded to the identity provider. */
      accessToken?: string;
    }
  }
}

export {};
