// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { Narrator } from '@/application/game/agents/Narrator.js';
import { GameStateManager } from '@/application/game/GameStateManager.js';
import { Dice } from '@/application/game/rules/dice.js';
import { loadContentRegistry } from '@/infrastructure/content/ContentLoader.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { RandomDiceRoller, SeededDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { OpenAIClient } from '@/infrastructure/llm/OpenAIClient.js';
import { buildAppConfig, configWarnings, validateConfig } from '@/utils/config.js';

async function main(): Promise<void> {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }
  configWarnings(config).forEach((warning) => console.warn(`[Config] ${warning}`));

  // Content is validated up front; a bad file stops startup
  const registry = loadContentRegistry(config.game.contentDir);

  console.log('Initializing database...');
  const dbService = await DatabaseService.initialize({ path: config.game.dbPath }, registry);
  const stats = dbService.getStats();
  console.log(`  Games: ${stats.games}`);
  console.log(`  Characters: ${stats.characters}`);

  const llmClient = config.llm.apiKey
    ? new OpenAIClient({
        apiKey: config.llm.apiKey,
        baseUrl: config.llm.baseUrl,
        model: config.llm.model,
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens,
        timeoutSeconds: config.llm.timeoutSeconds,
      })
    : null;
  const narrator = new Narrator(llmClient, {
    maxRetries: config.llm.maxRetries,
    retryBaseDelayMs: config.llm.retryBaseDelayMs,
  });

  const { diceSeed } = config.game;
  if (diceSeed !== null) {
    console.log(`[Server] Dice seeded with ${diceSeed}`);
  }
  const roller = diceSeed === null ? new RandomDiceRoller() : new SeededDiceRoller(diceSeed);

  const manager = new GameStateManager({
    registry,
    dice: new Dice(roller),
    narrator,
    gameStates: dbService.gameStates,
    characters: dbService.characters,
    inventoryLimit: config.game.inventoryLimit,
    maxRestCount: config.game.maxRestCount,
  });

  // Log startup info
  console.log('========================================');
  console.log('  Adventure Server Starting...');
  console.log('========================================');
  console.log(`  Node Env: ${config.server.nodeEnv}`);
  console.log(`  Port: ${config.server.port}`);
  console.log(`  LLM Model: ${llmClient ? config.llm.model : '(stub narration)'}`);
  console.log('========================================');

  const app = createApp(
    { registry, manager },
    {
      corsOrigins: config.server.corsOrigins,
      trustProxy: config.server.nodeEnv === 'production',
      logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
    }
  );

  // Start server
  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`✓ Server running at http://${config.server.host}:${config.server.port}`);
    console.log(`✓ Health check: http://${config.server.host}:${config.server.port}/health`);
    console.log('========================================');
  });

  // Graceful shutdown: every live game is saved before exit
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n${signal} received. Starting graceful shutdown...`);
    server.close(() => {
      console.log('✓ Server closed');
      manager
        .saveAll()
        .then((saved) => {
          console.log(`✓ Saved ${saved} game(s)`);
          return dbService.close();
        })
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('✗ Failed to save games during shutdown:', error);
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('✗ Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (err) => {
    console.error('Uncaught Exception:', err);
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason, promise) => {
    console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  });
}

// Run main
main().catch((error) => {
  console.error('Fatal error during startup:', error);
  process.exit(1);
});
