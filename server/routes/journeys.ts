/**
 * Journey Routes
 * Postcode search for the fastest public transport journey to each airport
 */

import { Router, type Request, type Response } from 'express';
import { searchQuerySchema, type SearchResponse } from '@shared/schema';
import { searchRateLimiter } from '../middleware/rateLimiter';
import { computeJourneys } from '../services/journeyService';
import { geocodePostcode } from '../services/postcodeService';
import { AIRPORTS } from '../services/destinationRegistry';
import { getErrorMessage } from '../utils/errors';

const router = Router();

/**
 * GET /api/destinations
 * The airports every search is planned against
 */
router.get('/destinations', (req: Request, res: Response) => {
  res.json({ destinations: AIRPORTS });
});

/**
 * GET /api/search?postcode=SW1A 1AA&date=20261020&time=0830
 * Resolve the postcode, then plan a journey to every airport
 */
router.get('/search', searchRateLimiter, async (req: Request, res: Response) => {
  const validation = searchQuerySchema.safeParse(req.query);

  if (!validation.success) {
    const postcodeIssue = validation.error.errors.find((issue) => issue.path[0] === 'postcode');
    if (postcodeIssue) {
      return res.status(400).json({ error: postcodeIssue.message });
    }

    return res.status(400).json({
      error: 'validation_error',
      message: 'Invalid query parameters',
      details: validation.error.errors,
    });
  }

  const { postcode, date, time } = validation.data;

  // Stop the provider calls if the browser gives up on us
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort(new Error('Client closed the connection'));
  });

  try {
    const origin = await geocodePostcode(postcode, { signal: controller.signal });
    if (!origin) {
      return res.status(400).json({
        error: `Could not find postcode '${postcode}'. Please check and try again.`,
      });
    }

    const results = await computeJourneys(origin, { date, time, signal: controller.signal });
    const body: SearchResponse = { postcode, origin, results };
    res.json(body);
  } catch (error) {
    if (controller.signal.aborted) {
      console.log(`[Search] Abandoned search for ${postcode}: ${getErrorMessage(controller.signal.reason)}`);
      return;
    }

    console.error('[Search] Search error:', error);
    res.status(500).json({
      error: 'internal_error',
      message: 'Failed to plan journeys',
    });
  }
});

export default router;
