import { renderContact, renderHelp } from '../../formatting/movieFormatter.js';
import { Command, CommandHandler } from '../types.js';

const showHelp: CommandHandler = async (ctx, deps) => {
  const { text, actions } = renderHelp(deps.config.promoLinks, ctx.botUsername);
  await ctx.reply(text, { actions });
};

export const startCommand: Command = {
  name: 'start',
  description: 'Welcome message and usage',
  execute: showHelp,
};

export const helpCommand: Command = {
  name: 'help',
  description: 'List available commands',
  execute: showHelp,
};

export const contactCommand: Command = {
  name: 'contactus',
  description: 'Contact the bot owner',
  execute: async (ctx, deps) => {
    const { text, actions } = renderContact(deps.config.contact);
    await ctx.reply(text, { actions });
  },
};
