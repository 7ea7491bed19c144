import type { Message } from "../../types";

export default {
  name: "first",
  process(messages: Message[]): Message[] {
    return messages;
  }
};
