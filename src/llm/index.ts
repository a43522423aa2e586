import type { Logger } from "pino";

import type { AppConfig } from "../config.js";
import { MockLLMProvider } from "./providers/mock.js";
import { YandexGptProvider } from "./providers/yandexgpt.js";
import type { LLMProvider } from "./types.js";

export function getLLMProvider(config: AppConfig, groupNames: string[], logger?: Logger): LLMProvider {
  if (config.LLM_PROVIDER === "yandexgpt" && config.YANDEXGPT_API_KEY && config.YANDEXGPT_FOLDER_ID) {
    logger?.debug({ provider: "yandexgpt" }, "llm provider selected");
    return new YandexGptProvider({
      apiKey: config.YANDEXGPT_API_KEY,
      folderId: config.YANDEXGPT_FOLDER_ID,
      logger
    });
  }

  logger?.debug({ provider: "mock", requested: config.LLM_PROVIDER }, "llm provider selected");
  return new MockLLMProvider(groupNames, logger);
}
