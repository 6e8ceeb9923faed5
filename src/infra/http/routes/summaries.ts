import { Router } from 'express';
import { z } from 'zod';
import {
  MIN_SUMMARY_TEXT_LENGTH,
  SummarizeUseCase,
} from '../../../application/summaries/summarize.js';
import type { Summarizer } from '../../../domain/summaries/summarizer.js';
import type { Logger } from '../../logger.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /summaries:
 *   post:
 *     tags: [Summaries]
 *     summary: Summarize a piece of text
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [text]
 *             properties:
 *               text: { type: string, minLength: 5 }
 *     responses:
 *       200:
 *         description: Summary
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 original_text: { type: string }
 *                 summary: { type: string }
 *       422:
 *         description: Text too short
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       502:
 *         description: Summarization provider failed
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const summarizeBodySchema = z.object({
  text: z.string().min(MIN_SUMMARY_TEXT_LENGTH, 'Text to summarize (min 5 characters).'),
});

export function createSummaryRoutes(summarizer: Summarizer, logger: Logger) {
  const router = Router();
  const summarizeUseCase = new SummarizeUseCase(summarizer, logger);

  router.post(
    '/',
    validate({ body: summarizeBodySchema }),
    asyncHandler(async (req, res) => {
      const body = summarizeBodySchema.parse(req.body);
      res.status(200).json(await summarizeUseCase.execute(body));
    })
  );

  return router;
}
