// Matches <system_reminder>Current datetime: ...</system_reminder>, non-greedy up to the first closing tag.
const SYSTEM_REMINDER_PATTERN = /<system_reminder>Current datetime: ([\s\S]*?)<\/system_reminder>/g;

export interface MarkerRewrite {
  text: string;
  count: number;
}

export function rewriteMarkers(text: string): MarkerRewrite {
  let count = 0;
  const rewritten = text.replace(SYSTEM_REMINDER_PATTERN, (_match, timestamp: string) => {
    count++;
    return `<date_and_time>${timestamp}</date_and_time>`;
  });

  // Hand back the original string when nothing matched
  return { text: count > 0 ? rewritten : text, count };
}
