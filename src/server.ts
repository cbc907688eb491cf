import { createApp } from './app.js';
import { getServerPort, loadConfig } from './config.js';

/**
 * Start the server
 */
async function bootstrap() {
  const config = await loadConfig();
  const port = getServerPort();

  const app = createApp();

  const server = app.listen(port, () => {
    console.log(`ePI section service listening on http://localhost:${port} (max section depth ${config.maxSectionDepth})`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
