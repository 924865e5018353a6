import { Telegraf } from 'telegraf';
import type { Context } from 'telegraf';
import type { Config } from '../config';
import type { TradingEngine } from '../engine/tradingEngine';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import {
  commandArgument,
  formatErrors,
  formatPositions,
  formatSignals,
  formatStatus,
  formatTrades,
  HELP_TEXT,
} from './formatters';

/** Commands that take a coin or strategy id. */
type ArgHandler = (arg: string) => Promise<string> | string;

export function isAllowedUser(allowedUsers: string[], userId: number | undefined): boolean {
  if (allowedUsers.length === 0) return true;
  return userId !== undefined && allowedUsers.includes(String(userId));
}

export class TelegramController {
  private bot: Telegraf;
  private config: Config;
  private engine: TradingEngine;
  private polling: Promise<void> | null = null;

  constructor(config: Config, engine: TradingEngine) {
    this.config = config;
    this.engine = engine;
    this.bot = new Telegraf(config.telegram.botToken);
    this.setupCommands();
  }

  private setupCommands(): void {
    this.bot.use(async (ctx, next) => {
      if (!isAllowedUser(this.config.telegram.allowedUsers, ctx.from?.id)) {
        logger.warn('Telegram', 'Ignoring message from unauthorized user', { userId: ctx.from?.id });
        return;
      }
      await next();
    });

    this.bot.start((ctx) => ctx.reply(HELP_TEXT));
    this.bot.help((ctx) => ctx.reply(HELP_TEXT));
    this.bot.command('ping', (ctx) => ctx.reply('✅ Engine is alive'));

    this.bot.command('status', async (ctx) => {
      await ctx.reply(formatStatus(await this.engine.getStatus()));
    });
    this.bot.command('positions', (ctx) => ctx.reply(formatPositions(this.engine.getPositions())));
    this.bot.command('signals', (ctx) => ctx.reply(formatSignals(this.engine.getSignals())));
    this.bot.command('trades', (ctx) => ctx.reply(formatTrades(this.engine.getTrades())));
    this.bot.command('errors', (ctx) => ctx.reply(formatErrors(this.engine.getErrors())));

    this.withArgument('enable', 'strategy', (id) =>
      this.engine.enableStrategy(id) ? `✅ Enabled ${id}` : `❓ Unknown strategy ${id}`,
    );
    this.withArgument('disable', 'strategy', (id) =>
      this.engine.disableStrategy(id) ? `⏸ Disabled ${id}` : `❓ Unknown strategy ${id}`,
    );
    this.withArgument('close', 'coin', async (coin) =>
      (await this.engine.closePosition(coin.toUpperCase())) ? `✅ Closed ${coin.toUpperCase()}` : `❌ Could not close ${coin.toUpperCase()}`,
    );
    this.withArgument('retry', 'coin', async (coin) =>
      (await this.engine.retryClose(coin.toUpperCase())) ? `✅ Closed ${coin.toUpperCase()}` : `❌ Retry failed for ${coin.toUpperCase()}`,
    );
    this.withArgument('dismiss', 'coin', async (coin) =>
      (await this.engine.dismissPosition(coin.toUpperCase()))
        ? `🗑 Dismissed ${coin.toUpperCase()}`
        : `❓ No failed position for ${coin.toUpperCase()}`,
    );

    this.bot.command('reload', async (ctx) => {
      try {
        const risk = this.engine.reloadRisk();
        await ctx.reply(`🔄 Risk reloaded: max ${risk.maxPositions}, size ${risk.positionSize}, SL ${risk.stopLossPercent}%, TP ${risk.takeProfitPercent}%`);
      } catch (error) {
        await ctx.reply(`❌ Reload rejected: ${errorMessage(error)}`);
      }
    });

    this.bot.command('stop', async (ctx) => {
      await ctx.reply('🚨 Emergency stop: closing all positions...');
      const remaining = await this.engine.emergencyStop();
      await ctx.reply(
        remaining.length === 0
          ? '🛑 All positions closed, engine stopped'
          : `⚠️ Engine stopped, ${remaining.length} position(s) still open: ${remaining.map((p) => p.coin).join(', ')}`,
      );
    });

    this.bot.catch((error: unknown, ctx: Context) => {
      logger.error('Telegram', `Handler failed for update ${ctx.update.update_id}`, { error: errorMessage(error) });
    });
  }

  private withArgument(command: string, argName: string, handler: ArgHandler): void {
    this.bot.command(command, async (ctx) => {
      const arg = commandArgument(ctx.message.text);
      if (!arg) {
        await ctx.reply(`Usage: /${command} <${argName}>`);
        return;
      }
      await ctx.reply(await handler(arg));
    });
  }

  async start(): Promise<void> {
    logger.info('Telegram', '📱 Starting Telegram bot...');
    await new Promise<void>((resolve, reject) => {
      // launch() settles only when polling ends
      this.polling = this.bot
        .launch(() => {
          logger.info('Telegram', '✅ Telegram bot started');
          resolve();
        })
        .catch((error: unknown) => {
          logger.error('Telegram', 'Bot polling stopped with an error', { error: errorMessage(error) });
          reject(error);
        });
    });
  }

  async stop(): Promise<void> {
    if (this.polling) {
      this.bot.stop('shutdown');
      await this.polling;
      this.polling = null;
    }
  }
}
