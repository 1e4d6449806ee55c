import { Router } from 'express';
import { getLogger } from '../logger.js';
import { describeStoreSession } from '../services/store-session.js';
import { asyncHandler } from '../utils/async-handler.js';

export const router = Router();

const log = getLogger('session');

router.get(
  '/',
  asyncHandler(async (req, res) => {
    const session = await describeStoreSession();
    if (session.environmentDefaulted) {
      // Kept as DEV until the intended mapping for other database names is confirmed.
      log.warn({ database: session.database }, 'database name has no DEV_/PRD_ prefix, assuming DEV');
    }
    res.json({ ...session, requestedBy: req.user ?? null });
  })
);
