import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";

export type Message = ChatCompletionMessageParam;

export type ProcessMessages = (messages: Message[], conversationId: string) => Message[];

/** A request-side plugin; `name` labels it in the pipeline log. */
export interface Plugin {
  name: string;
  process: ProcessMessages;
}
