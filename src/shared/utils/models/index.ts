import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { claudeBase } from "./anthropic";
import { gptBase } from "./openai";
import type { ChatModelArgs, ChatProvider } from "./types";
import { geminiBase } from "./vertexai";

export type { ChatModelArgs, ChatProvider };
export { claudeBase, geminiBase, gptBase };

export const CHAT_PROVIDERS: readonly ChatProvider[] = ["vertexai", "openai", "anthropic"];

export const isChatProvider = (value: string): value is ChatProvider =>
  CHAT_PROVIDERS.some((provider) => provider === value);

export const createChatModel = (
  provider: ChatProvider,
  args: ChatModelArgs,
  env: NodeJS.ProcessEnv = process.env
): BaseChatModel => {
  switch (provider) {
    case "vertexai":
      return geminiBase(args, env);
    case "openai":
      return gptBase(args, env);
    case "anthropic":
      return claudeBase(args, env);
  }
};
