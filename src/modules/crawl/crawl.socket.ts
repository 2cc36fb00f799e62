/**
 * Crawl Socket Handlers
 * Real-time WebSocket event handlers for crawl jobs
 */

import { Socket } from 'socket.io';
import { crawlService } from './crawl.service';
import { ICrawlJob } from './crawl.types';
import { FrontierStatistics } from '../../lib/crawling/crawling.types';

export type SocketResponse =
  | { success: true; job: ICrawlJob | null; live?: FrontierStatistics }
  | { success: false; error: string };

type Reply = (payload: SocketResponse) => void;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Current job status and live statistics
 */
export const handleStatusRequest = async (jobId: string, reply: Reply): Promise<void> => {
  try {
    const job = await crawlService.getJob(jobId);

    if (job) {
      reply({ success: true, job, live: crawlService.getLiveStatistics(jobId) });
    } else {
      reply({ success: false, error: 'Job not found' });
    }
  } catch (error) {
    reply({ success: false, error: errorMessage(error) });
  }
};

export const handleCancelRequest = async (jobId: string, reply: Reply): Promise<void> => {
  try {
    const job = await crawlService.cancelJob(jobId);
    reply({ success: true, job });
  } catch (error) {
    reply({ success: false, error: errorMessage(error) });
  }
};

/**
 * Register crawl socket event handlers
 */
export const registerCrawlSocketHandlers = (socket: Socket): void => {
  /**
   * Join a job room for progress updates
   */
  socket.on('crawl:join', (jobId: string) => {
    socket.join(`crawl:${jobId}`);
    console.log(`Socket ${socket.id} joined crawl room: ${jobId}`);
  });

  /**
   * Leave a job room
   */
  socket.on('crawl:leave', (jobId: string) => {
    socket.leave(`crawl:${jobId}`);
    console.log(`Socket ${socket.id} left crawl room: ${jobId}`);
  });

  socket.on('crawl:status', (jobId: string) =>
    handleStatusRequest(jobId, (payload) => socket.emit('crawl:status:response', payload))
  );

  socket.on('crawl:cancel', (jobId: string) =>
    handleCancelRequest(jobId, (payload) => socket.emit('crawl:cancel:response', payload))
  );
};
