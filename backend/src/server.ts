import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { existsSync, readFileSync } from 'node:fs';
import type { Server } from 'node:http';
import path from 'node:path';
import YAML from 'yaml';
import { config } from './config.js';
import { closePool } from './db.js';
import { logger } from './logger.js';
import { router as healthRouter } from './routes/health.js';
import { router as sessionRouter } from './routes/session.js';
import { router as rejectionsRouter } from './routes/rejections.js';
import { errorHandler } from './middleware/error-handler.js';
import { requireAuth } from './middleware/auth.js';
import { ensureImportRunTables } from './services/import-runs.js';

// Sources sit in backend/src, compiled output in dist/backend/src.
const openApiCandidates = [
  path.resolve(__dirname, '../openapi/openapi.yaml'),
  path.resolve(__dirname, '../../../backend/openapi/openapi.yaml'),
];
const openApiPath = openApiCandidates.find((candidate) => existsSync(candidate)) ?? openApiCandidates[0];
const openApiDocument = YAML.parse(readFileSync(openApiPath, 'utf8'));

const app = express();
app.set('trust proxy', true);
app.use(helmet());
app.use(cors());
app.use(express.json());
app.use(morgan('combined'));

app.use('/api/v1/health', healthRouter);

app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
app.get('/api/v1/openapi.json', (_req, res) => {
  res.json(openApiDocument);
});

app.use(requireAuth);

app.use('/api/v1/session', sessionRouter);
app.use('/api/v1/rejections', rejectionsRouter);

app.use(errorHandler);

function shutdown(server: Server, signal: NodeJS.Signals): void {
  logger.info(`[api] ${signal} received, closing`);
  server.close(() => {
    closePool()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'could not close the database pool');
        process.exit(1);
      });
  });
}

ensureImportRunTables()
  .then(() => {
    const server = app.listen(config.port, () => {
      logger.info(`[api] up on :${config.port}`);
    });
    process.once('SIGTERM', (signal) => shutdown(server, signal));
    process.once('SIGINT', (signal) => shutdown(server, signal));
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'could not prepare the import run tables');
    process.exit(1);
  });
