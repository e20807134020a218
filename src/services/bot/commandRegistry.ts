/**
 * Bot Command Registry
 *
 * Every slash command the bot answers, keyed by name.
 */

import { logger } from '../../middleware/logging.js';
import { Command } from './types.js';
import { contactCommand, helpCommand, startCommand } from './commands/help.js';
import { idCommand, searchCommand } from './commands/search.js';
import { popularCommand, trendingCommand } from './commands/lists.js';
import { favoritesCommand } from './commands/favorites.js';
import { broadcastCommand, statsCommand } from './commands/admin.js';

export function createCommandRegistry(): Map<string, Command> {
  const commands = new Map<string, Command>();

  for (const command of [
    startCommand,
    helpCommand,
    contactCommand,
    searchCommand,
    idCommand,
    trendingCommand,
    popularCommand,
    favoritesCommand,
    statsCommand,
    broadcastCommand,
  ]) {
    commands.set(command.name, command);
  }

  logger.debug('Bot commands initialized', { commands: Array.from(commands.keys()) });
  return commands;
}

/**
 * Commands shown in the Telegram client's menu; admin commands are left out
 */
export function publicCommandList(commands: Map<string, Command>): Array<{ command: string; description: string }> {
  return Array.from(commands.values())
    .filter(command => !command.adminOnly)
    .map(command => ({ command: command.name, description: command.description }));
}
