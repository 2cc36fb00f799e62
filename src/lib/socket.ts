/**
 * Socket.IO initialization
 * Connection handling is done in server.ts
 */

import { Server as HTTPServer } from 'http';
import { Server } from 'socket.io';
import { env } from '../config/env';

let io: Server | null = null;

export const initializeSocket = (httpServer: HTTPServer): Server => {
  io = new Server(httpServer, {
    cors: {
      origin: env.CLIENT_URL,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  });

  return io;
};

/**
 * Emit an event to everyone watching a crawl job. A no-op until the socket
 * server is running, so crawls can run without it.
 */
export const emitToJob = (jobId: string, event: string, payload: unknown): void => {
  if (!io) {
    return;
  }
  io.to(`crawl:${jobId}`).emit(event, payload);
};
