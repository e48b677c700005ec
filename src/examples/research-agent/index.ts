/**
 * Research Agent Example
 *
 * A LangGraph ReAct agent whose only tool is the multi-engine search tool.
 * The model decides when to search; each search queries every configured
 * engine through SerpAPI and appends a report to the output directory.
 *
 * Usage:
 *   CHAT_PROVIDER=openai npm run example:agent
 *
 * CHAT_PROVIDER picks the chat model (vertexai, openai or anthropic; default vertexai).
 */

import { HumanMessage } from "@langchain/core/messages";
import { MemorySaver, MessagesAnnotation, StateGraph } from "@langchain/langgraph";
import { ToolNode } from "@langchain/langgraph/prebuilt";
import * as readline from "readline";
import { createMultiSearchTool, MULTISEARCH_TOOL_NAME } from "../../multisearch/tool";
import { createChatModel, isChatProvider, type ChatProvider } from "../../shared/utils/models";

const searchTool = createMultiSearchTool();

const resolveProvider = (): ChatProvider => {
  const value = process.env.CHAT_PROVIDER ?? "vertexai";
  if (!isChatProvider(value)) {
    throw new Error(`Unknown CHAT_PROVIDER "${value}"`);
  }
  return value;
};

async function callModel(state: typeof MessagesAnnotation.State) {
  const model = createChatModel(resolveProvider(), { streaming: true });
  if (!model.bindTools) {
    throw new Error("Selected chat model does not support tool calling");
  }
  const response = await model.bindTools([searchTool]).invoke(state.messages);
  return { messages: [response] };
}

/**
 * Routes to the tools node while the last AI message still asks for tool calls.
 */
function shouldContinue(state: typeof MessagesAnnotation.State) {
  const lastMessage = state.messages[state.messages.length - 1];

  if (lastMessage && "tool_calls" in lastMessage && Array.isArray(lastMessage.tool_calls) && lastMessage.tool_calls.length > 0) {
    return "tools";
  }

  return "end";
}

export function createResearchAgent(checkpointer?: MemorySaver) {
  const workflow = new StateGraph(MessagesAnnotation)
    .addNode("agent", callModel)
    .addNode("tools", new ToolNode([searchTool]))
    .addEdge("__start__", "agent")
    .addConditionalEdges("agent", shouldContinue, {
      tools: "tools",
      end: "__end__",
    })
    .addEdge("tools", "agent");

  return workflow.compile(checkpointer ? { checkpointer } : {});
}

export { shouldContinue };

type ResearchAgent = ReturnType<typeof createResearchAgent>;

async function runWithStreaming(agent: ResearchAgent, input: HumanMessage, sessionId: string) {
  const eventStream = agent.streamEvents(
    { messages: [input] },
    {
      version: "v2",
      configurable: { thread_id: sessionId },
    }
  );

  let firstChunk = true;

  for await (const event of eventStream) {
    if (event.event === "on_chat_model_stream") {
      const content: unknown = event.data?.chunk?.content;
      if (typeof content === "string" && content.length > 0) {
        if (firstChunk) {
          console.log("\n🤖 Assistant: ");
          firstChunk = false;
        }
        process.stdout.write(content);
      }
    }

    if (event.event === "on_tool_start" && event.name === MULTISEARCH_TOOL_NAME) {
      console.log(`\n\n🔎 Searching all engines (this takes a while, engines are queried one by one)...`);
    }

    if (event.event === "on_tool_end" && event.name === MULTISEARCH_TOOL_NAME) {
      console.log("✅ Search finished");
      firstChunk = true;
    }
  }

  console.log("\n");
}

async function main() {
  console.log("=== Multi-Engine Research Agent ===");
  console.log("Type 'exit' or 'quit' to end the conversation\n");

  const agent = createResearchAgent(new MemorySaver());
  const sessionId = `session-${Date.now()}`;

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "\n💬 You: ",
  });

  rl.prompt();

  rl.on("line", (line) => {
    const userInput = line.trim();

    if (userInput.toLowerCase() === "exit" || userInput.toLowerCase() === "quit") {
      rl.close();
      return;
    }

    if (!userInput) {
      rl.prompt();
      return;
    }

    rl.pause();
    void runWithStreaming(agent, new HumanMessage(userInput), sessionId)
      .catch((error) => console.error("Agent run failed:", error))
      .finally(() => {
        rl.resume();
        rl.prompt();
      });
  });

  rl.on("close", () => {
    console.log("\n👋 Session ended.");
    process.exit(0);
  });
}

if (require.main === module) {
  main().catch(console.error);
}
