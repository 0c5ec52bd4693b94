/**
 * Server Entry Point
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env } from './config/env';

const startServer = (): void => {
  try {
    const app = createApp();
    const httpServer = createServer(app);

    httpServer.listen(env.PORT, () => {
      console.log('');
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('🚀 Site Audit Tools server is running');
      console.log(`🚀 Environment: ${env.NODE_ENV}`);
      console.log(`🚀 Port: ${env.PORT}`);
      console.log(`🚀 YouTube API: ${env.YOUTUBE_API_KEY ? '✅ Configured' : '⚠️  YOUTUBE_API_KEY not set'}`);
      console.log(`🚀 Health: http://localhost:${env.PORT}/health`);
      console.log(`🚀 Tools: http://localhost:${env.PORT}/api/tools`);
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('');
    });

    const shutdown = (signal: NodeJS.Signals) => {
      console.log(`${signal} signal received: closing HTTP server`);
      httpServer.close(() => {
        console.log('HTTP server closed');
        process.exit(0);
      });
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

startServer();
