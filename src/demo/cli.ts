#!/usr/bin/env node
/**
 * Interactive shipping assistant in the terminal.
 * Run: npm run demo (reads Ship360 and Azure OpenAI settings from .env)
 */

import "dotenv/config";
import { randomUUID } from "node:crypto";
import { createInterface } from "node:readline/promises";
import { createShippingAssistant, loadConfig } from "../index.js";

async function main() {
  const config = loadConfig(process.env);
  const assistant = await createShippingAssistant(config);
  const userId = process.env.USER ?? "cli-user";
  const sessionId = randomUUID();

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log('Shipping assistant ready. Try "Get rates for order ORD-1001". Type "exit" to quit.\n');
  try {
    for (;;) {
      const prompt = (await rl.question("> ")).trim();
      if (prompt === "exit" || prompt === "quit") break;
      if (prompt === "") continue;
      const reply = await assistant.chat.handleTurn({ userId, sessionId, prompt });
      console.log(`\n${reply.content}\n`);
    }
  } finally {
    rl.close();
    assistant.shutdown();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
