import { API_KEY_ENV, API_URL_ENV, DEFAULT_API_URL } from "./client.js";

/** Getting-started steps, for printing from a REPL or a setup script. */
export function setupInstructions(): string {
  return [
    "RunNotify setup",
    "=".repeat(40),
    "1. Create a Telegram bot by messaging @BotFather",
    "2. Start the backend and the bot with your bot token",
    "3. Message your bot with /start to get your API key",
    "4. Set your API key as an environment variable:",
    "",
    `   export ${API_KEY_ENV}=your_api_key_here`,
    `   export ${API_URL_ENV}=${DEFAULT_API_URL}`,
    "",
    "5. Test your connection:",
    "",
    '   import { ExperimentClient } from "@runnotify/client";',
    "   const client = ExperimentClient.fromEnv();",
    '   await client.notify("Hello from my experiment!");',
    "",
  ].join("\n");
}
