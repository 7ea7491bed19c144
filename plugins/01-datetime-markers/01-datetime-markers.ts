import type { Message, Plugin } from "../../src/plugins/types";
import { rewriteHistory } from "../../src/history/rewriter";
import { logProxyInfo } from "../../src/utils/logger";

const datetimeMarkers: Plugin = {
  name: "datetime-markers",
  process(messages: Message[], conversationId: string): Message[] {
    const { replaced } = rewriteHistory(messages);

    if (replaced > 0) {
      logProxyInfo("DatetimeMarkers", `[${conversationId}] Rewrote ${replaced} datetime marker(s)`);
    }

    return messages;
  }
};

export default datetimeMarkers;
