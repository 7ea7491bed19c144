import type { Message } from "../../types";

export default {
  name: "second",
  process(messages: Message[]): Message[] {
    return messages;
  }
};
