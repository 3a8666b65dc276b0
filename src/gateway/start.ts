import 'dotenv/config';

import process from 'node:process';
import path from 'node:path';
import { startBot } from './runtime.js';
import { resolveDefaultView } from '../app/views.js';
import { getBotHome } from '../runtime/botHome.js';
import { loadBotConfig } from '../runtime/botConfig.js';
import { reportStartupError } from '../runtime/startupErrors.js';
import { serializeError } from '../utils/runtimeLogger.js';

const botHome = getBotHome(process.env);
const logDir = process.env.LOG_DIR || path.join(botHome, 'logs');
const mode = process.env.BOT_MODE || 'polling';

const start = async () => {
  const config = loadBotConfig(process.env);

  console.log(`botline (${config.mode}) starting…`);
  const bot = await startBot({ config, resolveView: resolveDefaultView });

  const shutdown = () => {
    console.log('botline stopping…');
    bot.stop().catch((err) => {
      console.error('botline: shutdown failed', err);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await bot.done.catch(async (err: unknown) => {
    console.error('botline: ingestion stopped', serializeError(err));
    await bot.stop();
    process.exitCode = 1;
  });
};

start().catch((err) => {
  reportStartupError(err, { mode, botHome, logDir });
  process.exit(1);
});
