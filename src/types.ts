export type {
  ChatCompletionCreateParams as ChatCompletionRequest,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
