import { createApp } from "./app";
import { config, validateConfig } from "./config";
import { logger } from "./services/logger";
import { OpenAIVpbExtractor } from "./services/vpb-extraction";

logger.setLevel(config.logging.level);

// Validate configuration on startup
if (!validateConfig()) {
  console.error('❌ Configuration validation failed. Exiting...');
  process.exit(1);
}

const extractor = new OpenAIVpbExtractor({ apiKey: config.OPENAI_API_KEY });

const app = createApp({
  extractor,
  corsOrigins: config.corsOrigins,
  extractionConfigured: Boolean(config.OPENAI_API_KEY),
});

const port = config.PORT;
const server = app.listen(port, "0.0.0.0", () => {
  logger.info('server', `🚀 Serving on port ${port}`, { env: config.NODE_ENV });
});

server.on('error', (error: Error) => {
  logger.error('server', `❌ Failed to bind to port ${port}`, undefined, error);
  process.exit(1);
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info('server', `📴 ${signal} received, shutting down gracefully...`);
  server.close(() => {
    logger.info('server', '✅ Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
