import bodyParser from 'body-parser';
import express from 'express';
import { createArchitect, createLogger, detectProviderName, envConfigSource } from '@architect-critic/core';
import { registerRoutes } from './routes';

/** Boots the Express server and attaches routes. */
async function start(): Promise<void> {
  // Create the structured logger for the server.
  const logger = createLogger({ service: 'architect-critic-api' });
  // Read configuration from the environment (loads .env outside production).
  const source = envConfigSource();

  // Bind one architect for the lifetime of the process.
  const architect = createArchitect(detectProviderName(source), source, logger);

  // Create Express app.
  const app = express();
  // Configure body parser middleware.
  app.use(bodyParser.json({ limit: '1mb' }));
  // Register API routes.
  registerRoutes(app, architect, logger);

  // Start listening on the specified port.
  const port = process.env.PORT ? parseInt(process.env.PORT, 10) : 3000;
  // Launch the server.
  const server = app.listen(port, () => {
    logger.info(`API listening on port ${port}`, { provider: architect.provider.config.providerName });
  });

  // Stop accepting requests, then release the backend connection.
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`);
    server.close((error) => {
      architect.close();
      if (error) {
        logger.error('Error while closing the server', { error });
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

/**
 * Entry point: starts the server.
 */
start().catch((err: unknown) => {
  // Log any startup errors and exit.
  console.error(err instanceof Error ? err.message : String(err));
  // Exit with failure code.
  process.exit(1);
});
