import { describe, test, expect } from "vitest";
import { rewriteMarkers } from "./marker";

const marker = (timestamp: string) => `<system_reminder>Current datetime: ${timestamp}</system_reminder>`;

describe("rewriteMarkers", () => {
  test("extracts the timestamp exactly as written", () => {
    const result = rewriteMarkers(marker("2026-02-25 01:24 (CST)"));

    expect(result.text).toBe("<date_and_time>2026-02-25 01:24 (CST)</date_and_time>");
    expect(result.count).toBe(1);
  });

  test("keeps surrounding whitespace inside the timestamp", () => {
    const result = rewriteMarkers(marker(" 2026-02-25 01:24 "));

    expect(result.text).toBe("<date_and_time> 2026-02-25 01:24 </date_and_time>");
  });

  test("rewrites an empty timestamp to an empty replacement", () => {
    const result = rewriteMarkers("<system_reminder>Current datetime: </system_reminder> rest");

    expect(result).toEqual({ text: "<date_and_time></date_and_time> rest", count: 1 });
  });

  test("leaves text around the marker untouched", () => {
    const input = `Hello there,\n${marker("2026-02-25 01:24 (CST)")}\n  how are you?`;

    expect(rewriteMarkers(input).text).toBe(
      "Hello there,\n<date_and_time>2026-02-25 01:24 (CST)</date_and_time>\n  how are you?"
    );
  });

  test("replaces every occurrence with its own timestamp", () => {
    const input = `${marker("2026-02-25 01:24 (CST)")} then ${marker("2026-02-26 09:00 (UTC)")}`;
    const result = rewriteMarkers(input);

    expect(result.text).toBe(
      "<date_and_time>2026-02-25 01:24 (CST)</date_and_time> then <date_and_time>2026-02-26 09:00 (UTC)</date_and_time>"
    );
    expect(result.count).toBe(2);
  });

  test("returns the same string when nothing matches", () => {
    const input = "No markers here.";
    const result = rewriteMarkers(input);

    expect(result.text).toBe(input);
    expect(result.count).toBe(0);
  });

  test("ignores a marker without its closing tag", () => {
    const input = "<system_reminder>Current datetime: 2026-02-25 01:24";

    expect(rewriteMarkers(input)).toEqual({ text: input, count: 0 });
  });

  test("ignores reminders without the datetime prefix", () => {
    const input = "<system_reminder>Be concise.</system_reminder>";

    expect(rewriteMarkers(input)).toEqual({ text: input, count: 0 });
  });

  test("matches tag names case-sensitively", () => {
    const input = "<System_Reminder>Current datetime: 2026-02-25</System_Reminder>";

    expect(rewriteMarkers(input)).toEqual({ text: input, count: 0 });
  });

  test("stops the capture at the first closing tag", () => {
    const input = `${marker("a<b")}</system_reminder>`;

    expect(rewriteMarkers(input).text).toBe("<date_and_time>a<b</date_and_time></system_reminder>");
  });

  test("captures timestamps spanning lines", () => {
    expect(rewriteMarkers(marker("2026-02-25\n01:24")).text).toBe("<date_and_time>2026-02-25\n01:24</date_and_time>");
  });

  test("is idempotent", () => {
    const once = rewriteMarkers(`before ${marker("2026-02-25 01:24 (CST)")} after`).text;
    const twice = rewriteMarkers(once);

    expect(twice.text).toBe(once);
    expect(twice.count).toBe(0);
  });

  test("does not carry state between calls", () => {
    const input = marker("2026-02-25 01:24 (CST)");

    expect(rewriteMarkers(input).count).toBe(1);
    expect(rewriteMarkers(input).count).toBe(1);
  });
});
