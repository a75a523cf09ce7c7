import { loadConfig, resolvePort } from './config.js';
import { createApp } from './app.js';

/**
 * Start the server
 */
async function bootstrap() {
  const config = await loadConfig();

  const args = process.argv.slice(2);
  const portArg = args.find(a => a.startsWith('--port='));
  const port = portArg ? parseInt(portArg.split('=')[1], 10) : resolvePort(config);

  const app = createApp(config);

  const server = app.listen(port, () => {
    console.log(`tocgen service listening on http://localhost:${port}`);
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

bootstrap().catch(error => {
  console.error('Failed to start server', error);
  process.exit(1);
});
