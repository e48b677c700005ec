import dotenv from "dotenv";
import { ChatAnthropic } from "@langchain/anthropic";
import type { ChatModelArgs } from "./types";

dotenv.config();

export const claudeBase = (args: ChatModelArgs, env: NodeJS.ProcessEnv = process.env): ChatAnthropic => {
  if (!env.ANTHROPIC_API_KEY) {
    throw new Error("ANTHROPIC_API_KEY environment variable is not set.");
  }

  return new ChatAnthropic({
    model: args.model ?? "claude-sonnet-4-20250514",
    apiKey: env.ANTHROPIC_API_KEY,
    temperature: 0,
    streaming: args.streaming,
    maxRetries: 2,
  });
};
