import { encode } from "gpt-tokenizer";
import { isRecord } from "./guards";

// Special-token text such as <|endoftext|> is ordinary user input here
const PLAIN_TEXT = { disallowedSpecial: new Set<string>() };

export function countTextTokens(text: unknown): number {
  return typeof text === "string" ? encode(text, PLAIN_TEXT).length : 0;
}

function countContentTokens(content: unknown): number {
  if (!Array.isArray(content)) {
    return countTextTokens(content);
  }

  let total = 0;
  for (const part of content) {
    if (isRecord(part) && part.type === "text") {
      total += countTextTokens(part.text);
    }
  }
  return total;
}

function countToolCallTokens(toolCalls: unknown): number {
  if (!Array.isArray(toolCalls)) {
    return 0;
  }

  let total = 0;
  for (const toolCall of toolCalls) {
    if (!isRecord(toolCall) || !isRecord(toolCall.function)) continue;
    total += countTextTokens(toolCall.function.name);
    total += countTextTokens(toolCall.function.arguments);
  }
  return total;
}

/**
 * Counts role, text content, tool-call and tool-result tokens. Entries that are
 * not message objects count as zero.
 */
export function countMessageTokens(messages: readonly unknown[]): number {
  let total = 0;

  for (const message of messages) {
    if (!isRecord(message)) continue;

    total += countTextTokens(message.role);
    total += countContentTokens(message.content);
    total += countToolCallTokens(message.tool_calls);
    total += countTextTokens(message.tool_call_id);
  }

  return total;
}

export function calculateAddedTokens(
  originalMessages: readonly unknown[],
  processedMessages: readonly unknown[]
): number {
  return countMessageTokens(processedMessages) - countMessageTokens(originalMessages);
}

/**
 * Drops messages that plugins added, first to last, until the tokens they add
 * fit within `maxTokens`.
 *
 * A processed message counts as original when it equals an original message at
 * the same index, or when it is one of the `retained` objects a plugin edited
 * in place.
 */
export function truncateAddedContent<T>(
  originalMessages: readonly unknown[],
  processedMessages: T[],
  maxTokens: number,
  retained: ReadonlySet<unknown> = new Set()
): T[] {
  const addedTokens = calculateAddedTokens(originalMessages, processedMessages);

  if (addedTokens <= maxTokens) {
    return processedMessages;
  }

  const result: T[] = [];
  let tokensRemoved = 0;
  const tokensToRemove = addedTokens - maxTokens;

  for (let i = 0; i < processedMessages.length; i++) {
    const message = processedMessages[i];
    const isOriginalMessage = retained.has(message) || (
      i < originalMessages.length &&
      JSON.stringify(message) === JSON.stringify(originalMessages[i])
    );

    if (isOriginalMessage || tokensRemoved >= tokensToRemove) {
      result.push(message);
    } else {
      tokensRemoved += countMessageTokens([message]);
    }
  }

  return result;
}
