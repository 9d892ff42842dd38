import express, { Router, type Request, type Response } from 'express';
import type { PpeImportConfig } from '../config/ppeImport';
import { asyncErrorHandler, createErrorResponse, ppeErrorMap } from '../middleware/validation/errors';
import { validateUuidParam } from '../middleware/validation/schema';
import { importQuerySchema, stockReceiptSchema } from '../schemas/ppeStock.schema';
import { formatImportSummary, importStockReceipts } from '../services/ppeStock/import.service';
import {
  getImportRun,
  getImportTemplate,
  IMPORT_TEMPLATE_FILE_NAME,
  listActiveItems,
  listSizesForItem,
  listStockLevels,
  recordStockReceipt
} from '../services/ppeStock/receiving.service';
import type { PpeStockStore } from '../services/ppeStock/types';

type PpeStockRouterDeps = {
  store: PpeStockStore;
  importConfig: PpeImportConfig;
};

function requireUserId(req: Request): string {
  const userId = req.auth?.userId;
  if (!userId) {
    throw new Error('AUTH_REQUIRED');
  }
  return userId;
}

export function createPpeStockRouter({ store, importConfig }: PpeStockRouterDeps) {
  const router = Router();
  const errorMap = {
    ...ppeErrorMap,
    AUTH_REQUIRED: () => createErrorResponse(401, 'Missing access token.')
  };

  router.get(
    '/ppe/items',
    asyncErrorHandler(
      async (_req: Request, res: Response) => {
        const items = await listActiveItems(store);
        return res.json({ data: items });
      },
      { location: 'PPE Catalog - List items', errorMap }
    )
  );

  router.get(
    '/ppe/items/:id/sizes',
    validateUuidParam('id'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const sizes = await listSizesForItem(store, req.params.id);
        return res.json({ data: sizes });
      },
      { location: 'PPE Catalog - Load sizes', errorMap }
    )
  );

  router.post(
    '/ppe/stock/receipts',
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const parsed = stockReceiptSchema.safeParse(req.body);
        if (!parsed.success) {
          return res.status(400).json({ error: 'Valid quantity and unit cost required.', details: parsed.error.flatten() });
        }
        const record = await recordStockReceipt(store, parsed.data, requireUserId(req));
        return res.status(201).json({ data: record });
      },
      {
        location: 'PPE Stock Receive - Submit',
        errorMap,
        pgErrors: {
          foreignKey: () => createErrorResponse(400, 'PPE item or size no longer exists.'),
          check: () => createErrorResponse(400, 'Receipt violates a stock constraint.')
        }
      }
    )
  );

  router.get(
    '/ppe/stock/levels',
    asyncErrorHandler(
      async (_req: Request, res: Response) => {
        const levels = await listStockLevels(store);
        return res.json({ data: levels });
      },
      { location: 'PPE Stock Levels', errorMap }
    )
  );

  router.get(
    '/ppe/stock/imports/template',
    asyncErrorHandler(
      async (_req: Request, res: Response) => {
        const contents = await getImportTemplate(importConfig);
        res.setHeader('Content-Type', 'text/csv; charset=utf-8');
        res.setHeader('Content-Disposition', `attachment; filename="${IMPORT_TEMPLATE_FILE_NAME}"`);
        return res.send(contents);
      },
      { location: 'PPE Stock Receive - Template', errorMap }
    )
  );

  router.post(
    '/ppe/stock/imports',
    express.text({ type: ['text/*', 'application/csv'], limit: importConfig.maxBytes }),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const queryResult = importQuerySchema.safeParse(req.query);
        if (!queryResult.success) {
          return res.status(400).json({ error: 'Invalid import options.', details: queryResult.error.flatten() });
        }
        const csvText = typeof req.body === 'string' ? req.body : '';
        if (!csvText.trim()) {
          return res.status(400).json({ error: 'CSV is empty.' });
        }

        const outcome = await importStockReceipts(
          store,
          { csvText, userId: requireUserId(req), fileName: queryResult.data.fileName ?? null },
          importConfig,
          { includeRowErrors: queryResult.data.details === 'true' }
        );
        return res.status(201).json({
          data: {
            ...outcome,
            message: formatImportSummary(outcome)
          }
        });
      },
      { location: 'PPE Stock Receive - CSV import', errorMap }
    )
  );

  router.get(
    '/ppe/stock/imports/:id',
    validateUuidParam('id'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const run = await getImportRun(store, req.params.id);
        if (!run) {
          return res.status(404).json({ error: 'Import not found.' });
        }
        return res.json({ data: run });
      },
      { location: 'PPE Stock Receive - Import run', errorMap }
    )
  );

  return router;
}
