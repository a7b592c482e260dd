import { Router } from 'express';
import { z } from 'zod';
import type { QueryClient } from '../warehouse.js';
import { asyncHandler } from '../utils/async-handler.js';
import { decodeRows, textField } from '../utils/rows.js';
import { responseAbortSignal } from '../utils/request-signal.js';

const nowRowSchema = z.object({ now: textField });

export function createHealthRouter(client: QueryClient): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const rows = await client.query('SELECT CURRENT_TIMESTAMP() AS now', {
        signal: responseAbortSignal(res),
        label: 'health',
      });
      const [row] = decodeRows(nowRowSchema, rows, 'health');
      res.json({ status: 'ok', time: row?.now ?? null });
    })
  );

  return router;
}
