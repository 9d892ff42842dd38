import 'dotenv/config';
import express from 'express';
import { resolvePpeImportConfig } from './config/ppeImport';
import { resolveServerConfig } from './config/server';
import { resolveJwtSecret } from './lib/auth';
import { logEvent } from './lib/logger';
import { requireAuth } from './middleware/auth.middleware';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { bodyParserErrorHandler } from './middleware/validation/bodyErrors';
import healthRouter from './routes/health.routes';
import { createPpeStockRouter } from './routes/ppeStock.routes';
import { createPgPpeStockStore } from './services/ppeStock/pgStore';

const serverConfig = resolveServerConfig();
const importConfig = resolvePpeImportConfig();
const jwtSecret = resolveJwtSecret();

const store = createPgPpeStockStore({ defaultCategory: importConfig.defaultCategory });

const app = express();
app.use(requestContextMiddleware);
app.use(requestLoggerMiddleware());
app.use(express.json({ limit: serverConfig.jsonBodyLimit }));

// Health checks stay public; everything under /ppe needs a bearer token.
app.use(healthRouter);
app.use('/ppe', requireAuth(jwtSecret));
app.use(createPpeStockRouter({ store, importConfig }));

app.use((_req, res) => {
  res.status(404).json({ error: 'Not found' });
});

app.use(bodyParserErrorHandler);

app.listen(serverConfig.port, () => {
  logEvent('info', 'server_started', { port: serverConfig.port, nodeEnv: serverConfig.nodeEnv });
});
