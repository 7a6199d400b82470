import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { getDeskSetupTips } from '../../engine/content.js';

const tipsCommand: Command = {
  name: 'tips',
  description: 'Show ergonomic desk setup tips',
  usage: 'tips',
  async run(ctx: CommandContext): Promise<number> {
    const tips = getDeskSetupTips();

    if (ctx.output.isJson) {
      ctx.output.json({ tips });
      return 0;
    }

    ctx.output.log('Desk setup tips:');
    ctx.output.list(tips);
    return 0;
  },
};

registerCommand(tipsCommand);

export default tipsCommand;
