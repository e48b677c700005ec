import dotenv from "dotenv";
import { ChatVertexAI } from "@langchain/google-vertexai";
import type { ChatModelArgs } from "./types";

dotenv.config();

export const geminiBase = (args: ChatModelArgs, env: NodeJS.ProcessEnv = process.env): ChatVertexAI => {
  if (!env.GOOGLE_APPLICATION_CREDENTIALS) {
    throw new Error(
      "GOOGLE_APPLICATION_CREDENTIALS environment variable is not set. " +
      "Gemini agent cannot be initialized. Ensure it's set to the path of your service account key file."
    );
  }

  return new ChatVertexAI({
    model: args.model ?? "gemini-2.5-flash",
    authOptions: { keyFile: env.GOOGLE_APPLICATION_CREDENTIALS },
    temperature: 0,
    streaming: args.streaming,
    maxRetries: 2,
  });
};
