import express from 'express';
import dotenv from 'dotenv';
import { createAuthRoutes } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { buildOpenApiDocument } from './swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { createCognitoApi } from '../cognito/client.js';
import { CognitoAdapter } from '../cognito/cognitoAdapter.js';

dotenv.config();

const config = loadConfig();
const logger = createLogger(config);

const identityProvider = new CognitoAdapter(
  {
    userPoolId: config.cognito.userPoolId,
    clientId: config.cognito.clientId,
  },
  createCognitoApi(config.cognito.region),
  logger
);

const app = express();

// Middleware
app.use(express.json());
app.use(createApiRateLimiter());

// Health check endpoint (process liveness only; the user pool is not probed)
app.get('/healthz', (_req, res) => {
  res.status(200).json({ status: 'ok' });
});

// Swagger/OpenAPI docs
app.use(createSwaggerRoutes(buildOpenApiDocument({ port: config.port })));

app.use('/api/auth', createAuthRoutes(identityProvider));

// Error handler (must be last)
app.use(errorHandler(logger));

app.listen(config.port, () => {
  logger.info({ port: config.port, region: config.cognito.region }, 'Identity service listening');
});

export default app;
