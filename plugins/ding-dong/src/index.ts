/**
 * Ding-Dong Plugin
 *
 * Answers `dong` when a message mentions the bot with the text `ding`,
 * and reports how many times it did so.
 */

import { Router } from 'express';
import type { Message } from '@chatplug/entities';
import {
  ChatPlugin,
  type PluginOptions,
  type PluginRuntime,
  type RouteContribution,
  type RouteContributor,
} from '@chatplug/plugin-api';

export const TRIGGER = 'ding';
export const REPLY = 'dong';

export class DingDongPlugin extends ChatPlugin implements RouteContributor {
  private replies = 0;

  readonly routes: RouteContribution[] = [
    {
      prefix: 'stats',
      createRouter: () => {
        const router = Router();

        // GET /api/plugins/{name}/stats
        router.get('/', (_req, res) => {
          res.json({ data: { replies: this.replies } });
        });

        return router;
      },
    },
  ];

  constructor(options: PluginOptions = {}) {
    super({ name: 'ding-dong', ...options });
  }

  get replyCount(): number {
    return this.replies;
  }

  async init(_runtime: PluginRuntime): Promise<void> {
    this.logger.info('Ding-dong plugin ready');
  }

  async onMessage(message: Message): Promise<void> {
    await message.ready();
    const text = await message.mentionText();
    if (text !== TRIGGER) return;

    await message.say(REPLY);
    this.replies += 1;
    this.output.set('replies', this.replies);
    this.logger.debug('Replied to ding', { message: message.id });
  }
}

export default DingDongPlugin;
