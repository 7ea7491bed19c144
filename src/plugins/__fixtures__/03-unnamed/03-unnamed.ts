import type { Message } from "../../types";

export default {
  process(messages: Message[], conversationId: string): Message[] {
    return [...messages, { role: "system", content: `conversation ${conversationId}` }];
  }
};
