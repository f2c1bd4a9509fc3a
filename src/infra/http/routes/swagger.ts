import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';

/**
 * Interactive docs at /docs, raw OpenAPI document at /docs.json.
 */
export function createSwaggerRoutes(document: object) {
  const router = Router();

  router.get('/docs.json', (_req, res) => {
    res.json(document);
  });
  router.use('/docs', swaggerUi.serve, swaggerUi.setup(document, {
    customSiteTitle: 'Identity Service API',
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
