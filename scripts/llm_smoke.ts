import "dotenv/config";
import { strict as assert } from "node:assert";
import pino from "pino";

import { loadConfig } from "../src/config.js";
import { loadKnowledgeBase } from "../src/knowledge.js";
import { getLLMProvider } from "../src/llm/index.js";
import { extractJson } from "../src/nlu/extractJson.js";

function pass(message: string): void {
  process.stdout.write(`[PASS] ${message}\n`);
}

/** Sends a few fixed phrases to the configured provider and checks the JSON it returns. */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({ level: config.LOG_LEVEL });
  const kb = await loadKnowledgeBase(config.KB_FILE_PATH);
  const provider = getLLMProvider(config, kb.serviceNames(), logger);

  const cases: Array<{ text: string; intent: string }> = [
    { text: "Хочу записаться на хип-хоп завтра в 19:00", intent: "booking" },
    { text: "Сколько стоит абонемент?", intent: "price_query" },
    { text: "Позовите администратора", intent: "admin" }
  ];

  for (const c of cases) {
    const response = await provider.complete({
      messages: [
        { role: "system", content: kb.formatForPrompt() },
        { role: "user", content: c.text }
      ]
    });
    const parsed = extractJson(response.text);
    assert.ok(parsed, `${provider.providerName} returned no JSON for "${c.text}"`);
    assert.equal(parsed.intent, c.intent, `unexpected intent for "${c.text}"`);
    pass(`${provider.providerName}: "${c.text}" -> ${c.intent} (${response.tokensUsed} tokens)`);
  }

  process.stdout.write("[OK] llm smoke passed\n");
}

void main();
