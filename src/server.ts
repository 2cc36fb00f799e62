/**
 * Server Entry Point
 * Initializes Express server, MongoDB, and Socket.IO
 */

import { createServer } from 'http';
import { createApp } from './app';
import { connectDB, disconnectDB } from './lib/mongo';
import { initializeSocket } from './lib/socket';
import { registerCrawlSocketHandlers } from './modules/crawl/crawl.socket';
import { crawlService } from './modules/crawl/crawl.service';
import { env } from './config/env';

const startServer = async (): Promise<void> => {
  // Connect to MongoDB
  await connectDB();

  // Create Express app
  const app = createApp();

  // Create HTTP server
  const httpServer = createServer(app);

  // Initialize Socket.IO
  const io = initializeSocket(httpServer);

  // Register Socket.IO handlers
  io.on('connection', (socket) => {
    console.log(`✅ Socket connected: ${socket.id}`);

    registerCrawlSocketHandlers(socket);

    socket.on('disconnect', () => {
      console.log(`❌ Socket disconnected: ${socket.id}`);
    });
  });

  // Start server
  httpServer.listen(env.PORT, () => {
    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log(`🚀 Crawl Frontier Server is running`);
    console.log(`🚀 Environment: ${env.NODE_ENV}`);
    console.log(`🚀 Port: ${env.PORT}`);
    console.log(`🚀 Output: ${env.CRAWL_OUTPUT_DIR}`);
    console.log(`🚀 API: http://localhost:${env.PORT}/health`);
    console.log(`🚀 Socket.IO: ws://localhost:${env.PORT}`);
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('');
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    console.log(`${signal} signal received: closing HTTP server`);
    httpServer.close(() => {
      console.log('HTTP server closed');
      crawlService
        .shutdown()
        .then(() => {
          console.log('Running crawls stopped');
          return disconnectDB();
        })
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

// Start the server
startServer().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
