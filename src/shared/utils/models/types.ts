export type ChatProvider = "vertexai" | "openai" | "anthropic";

export interface ChatModelArgs {
  streaming: boolean;
  model?: string;
}
