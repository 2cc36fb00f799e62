/**
 * Crawl Router
 * Route definitions for crawl endpoints
 */

import { Router } from 'express';
import { crawlController } from './crawl.controller';

const router = Router();

/**
 * @route   POST /api/crawl
 * @desc    Create and start a crawl job
 */
router.post('/', crawlController.createJob);

/**
 * @route   GET /api/crawl
 * @desc    List recent crawl jobs
 */
router.get('/', crawlController.getJobs);

/**
 * @route   GET /api/crawl/:id
 * @desc    Get a crawl job with live statistics
 */
router.get('/:id', crawlController.getJob);

/**
 * @route   POST /api/crawl/:id/cancel
 * @desc    Cancel a crawl job
 */
router.post('/:id/cancel', crawlController.cancelJob);

/**
 * @route   DELETE /api/crawl/:id
 * @desc    Delete a crawl job
 */
router.delete('/:id', crawlController.deleteJob);

export default router;
