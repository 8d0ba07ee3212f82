import type { Express } from 'express';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { describeError } from '../modules/rewards/errors.js';
import { rewardsLogger } from '../modules/rewards/utils.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// tsc does not copy the YAML into dist, so fall back to the source tree.
const OPENAPI_CANDIDATES = [
  path.join(__dirname, 'openapi.yaml'),
  path.join(process.cwd(), 'src', 'api', 'openapi.yaml')
];

export function loadOpenApiDocument(): { yaml: string; document: Record<string, unknown> } | null {
  const openapiPath = OPENAPI_CANDIDATES.find((candidate) => fs.existsSync(candidate));
  if (!openapiPath) {
    return null;
  }
  const yaml = fs.readFileSync(openapiPath, 'utf8');
  const document: unknown = YAML.parse(yaml);
  return isJsonObject(document) ? { yaml, document } : null;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Sets up OpenAPI documentation with Swagger UI
 * Exposes three routes:
 * - GET /api-docs - Interactive Swagger UI
 * - GET /api-docs/openapi.json - Spec as JSON
 * - GET /api-docs/openapi.yaml - Spec as YAML
 */
export function setupOpenAPI(app: Express): void {
  try {
    const loaded = loadOpenApiDocument();
    if (!loaded) {
      rewardsLogger.warn('[OpenAPI] openapi.yaml not found, Swagger UI disabled');
      return;
    }
    const { yaml, document } = loaded;

    const swaggerUiOptions = {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'Grid Rewards Monitor API',
      swaggerOptions: {
        displayRequestDuration: true,
        filter: true
      }
    };

    // JSON and YAML routes go first so the Swagger UI static handler does not shadow them.
    app.get('/api-docs/openapi.json', (_req, res) => {
      res.json(document);
    });

    app.get('/api-docs/openapi.yaml', (_req, res) => {
      res.setHeader('Content-Type', 'text/yaml');
      res.send(yaml);
    });

    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(document, swaggerUiOptions));

    rewardsLogger.info('[OpenAPI] Documentation available at /api-docs');
  } catch (error) {
    rewardsLogger.error('[OpenAPI] Failed to load OpenAPI specification', {
      error: describeError(error)
    });
  }
}
