import type { App } from '@slack/bolt';

import { ChatId, Messenger } from '../types';

/** Posts plain-text messages through the bot's Web API client. */
export const createSlackMessenger = (client: App['client']): Messenger => {
  return {
    async sendMessage(chatId: ChatId, text: string): Promise<void> {
      await client.chat.postMessage({ channel: chatId, text });
    },
  };
};
