import dotenv from "dotenv";
import { ChatOpenAI } from "@langchain/openai";
import type { ChatModelArgs } from "./types";

dotenv.config();

export const gptBase = (args: ChatModelArgs, env: NodeJS.ProcessEnv = process.env): ChatOpenAI => {
  if (!env.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY environment variable is not set.");
  }

  return new ChatOpenAI({
    model: args.model ?? "gpt-4o",
    apiKey: env.OPENAI_API_KEY,
    temperature: 0,
    streaming: args.streaming,
    maxRetries: 2,
  });
};
