/**
 * Crawl Controller
 * HTTP request/response handling for crawl endpoints
 */

import { Request, Response } from 'express';
import { crawlService } from './crawl.service';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { validateCrawlJobConfig } from './crawl.validation';
import { CrawlStatus, ICrawlJobResponse, ICrawlListResponse } from './crawl.types';

function parseStatus(value: unknown): CrawlStatus | undefined {
  if (value === undefined) {
    return undefined;
  }
  const status = Object.values(CrawlStatus).find((candidate) => candidate === value);
  if (!status) {
    throw new ApiError(400, `Unknown status filter: ${String(value)}`);
  }
  return status;
}

export class CrawlController {
  /**
   * POST /api/crawl
   * Validate the job configuration and start a crawl
   */
  createJob = asyncHandler(async (req: Request, res: Response) => {
    const request = validateCrawlJobConfig(req.body);
    const job = await crawlService.createJob(request);

    const response: ICrawlJobResponse = {
      success: true,
      job,
    };

    res.status(201).json(response);
  });

  /**
   * GET /api/crawl/:id
   * Stored job plus live frontier statistics while it runs
   */
  getJob = asyncHandler(async (req: Request, res: Response) => {
    const { id } = req.params;

    const job = await crawlService.getJob(id);
    if (!job) {
      throw new ApiError(404, 'Crawl job not found');
    }

    const response: ICrawlJobResponse = {
      success: true,
      job,
      live: crawlService.getLiveStatistics(id),
    };

    res.json(response);
  });

  /**
   * GET /api/crawl
   * Recent crawl jobs, optionally filtered by status
   */
  getJobs = asyncHandler(async (req: Request, res: Response) => {
    const page = parseInt(String(req.query.page ?? ''), 10) || 1;
    const limit = Math.min(parseInt(String(req.query.limit ?? ''), 10) || 20, 100);
    const status = parseStatus(req.query.status);

    const { jobs, total } = await crawlService.listJobs({ page, limit, status });

    const response: ICrawlListResponse = {
      success: true,
      jobs,
      total,
    };

    res.json(response);
  });

  /**
   * POST /api/crawl/:id/cancel
   * Cancel a queued or running crawl
   */
  cancelJob = asyncHandler(async (req: Request, res: Response) => {
    const job = await crawlService.cancelJob(req.params.id);
    if (!job) {
      throw new ApiError(404, 'Crawl job not found');
    }

    const response: ICrawlJobResponse = {
      success: true,
      job,
    };

    res.json(response);
  });

  /**
   * DELETE /api/crawl/:id
   * Delete a finished crawl job record
   */
  deleteJob = asyncHandler(async (req: Request, res: Response) => {
    const deleted = await crawlService.deleteJob(req.params.id);
    if (!deleted) {
      throw new ApiError(404, 'Crawl job not found');
    }

    res.json({
      success: true,
      message: 'Job deleted successfully',
    });
  });
}

export const crawlController = new CrawlController();
