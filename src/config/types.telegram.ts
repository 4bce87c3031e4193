export type TelegramConfig = {
  /** Bot token from BotFather. JOINGATE_BOT_TOKEN / TELEGRAM_BOT_TOKEN win over this. */
  botToken?: string;
};
