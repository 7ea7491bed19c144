import type { Plugin, Message } from "../plugins/types";
import { loadPlugins } from "../plugins/loader";
import { truncateAddedContent } from "../utils/token-counter";
import { logProxyInfo, logProxyError } from "../utils/logger";

export class PluginProcessor {
  private plugins: Plugin[] = [];
  private maxPluginTokens = 0;

  async load(pluginsSource: string | Plugin[], maxTokens: number): Promise<void> {
    if (typeof pluginsSource === "string") {
      this.plugins = await loadPlugins(pluginsSource);
    } else {
      this.plugins = pluginsSource;
    }
    this.maxPluginTokens = maxTokens;
  }

  pluginCount(): number {
    return this.plugins.length;
  }

  processRequest(messages: Message[], conversationId: string): Message[] {
    if (this.plugins.length === 0) {
      return messages;
    }

    logProxyInfo("PluginProcessor", `Executing ${this.plugins.length} plugin(s)`);
    // Plugins may rewrite messages in place, so compare against a snapshot
    const originalMessages = structuredClone(messages);
    const inputMessages = new Set(messages);
    let previous = JSON.stringify(originalMessages);
    let modified = messages;

    for (const plugin of this.plugins) {
      const pluginName = plugin.name;

      try {
        modified = plugin.process(modified, conversationId);
      } catch (e) {
        logProxyError("PluginProcessor", `Plugin [${pluginName}] failed, skipping`, e);
        continue;
      }

      const current = JSON.stringify(modified);
      if (current !== previous) {
        logProxyInfo("PluginProcessor", `Plugin [${pluginName}] modified messages`);
        previous = current;
      }
    }

    try {
      return truncateAddedContent(originalMessages, modified, this.maxPluginTokens, inputMessages);
    } catch (e) {
      logProxyError("PluginProcessor", "Token budget check failed, forwarding messages untruncated", e);
      return modified;
    }
  }
}
