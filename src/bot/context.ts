import type { AppConfig } from '../config/index.js';
import type { SessionStore } from '../games/blackjack/sessionStore.js';
import type { Logger } from '../log.js';

/** Everything a command handler needs; built once at boot and passed down. */
export interface BotContext {
  store: SessionStore;
  config: AppConfig;
  log: Logger;
}
