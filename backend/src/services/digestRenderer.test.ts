import { describe, expect, it } from "vitest";
import { makeHighlight } from "../testing/fixtures.js";
import { escapeHtml, renderDigest } from "./digestRenderer.js";

const date = new Date("2024-01-05T12:00:00.000Z");

describe("renderDigest", () => {
  it("builds the subject from the date", () => {
    expect(renderDigest([], { date, timeZone: "UTC" }).subject).toBe("Your Daily Kindle Highlights - January 5");
  });

  it("formats the date in the requested zone", () => {
    const evening = new Date("2024-01-05T03:00:00.000Z");
    const document = renderDigest([], { date: evening, timeZone: "America/Los_Angeles" });

    expect(document.subject).toBe("Your Daily Kindle Highlights - January 4");
    expect(document.text).toBe("Your Daily Highlights - January 04, 2024");
  });

  it("renders one escaped block per highlight", () => {
    const { html } = renderDigest(
      [
        makeHighlight({
          title: "Dune",
          author: "Frank <Herbert>",
          text: "Fear is\nthe mind-killer.",
          theme: "Fiction"
        })
      ],
      { date, timeZone: "UTC" }
    );

    expect(html).toContain("    <p>January 05, 2024</p>");
    expect(html).toContain('    <p class="highlight-theme">Fiction</p>');
    expect(html).toContain('    <p class="highlight-text">&ldquo;Fear is<br>the mind-killer.&rdquo;</p>');
    expect(html).toContain(
      '    <p class="highlight-source">&mdash; <strong>Dune</strong> by Frank &lt;Herbert&gt;</p>'
    );
  });

  it("omits the theme label when a highlight has none", () => {
    const { html } = renderDigest([makeHighlight()], { date, timeZone: "UTC" });

    expect(html).not.toContain('<p class="highlight-theme">');
    expect(html.match(/<div class="highlight">/g)).toHaveLength(1);
  });

  it("renders an empty body for an empty selection", () => {
    const document = renderDigest([], { date, timeZone: "UTC" });

    expect(document.html).not.toContain('<div class="highlight">');
    expect(document.html).toContain('<div class="footer">');
    expect(document.text).toBe("Your Daily Highlights - January 05, 2024");
  });

  it("renders a plain-text version", () => {
    const { text } = renderDigest(
      [
        makeHighlight({ theme: "Productivity" }),
        makeHighlight({ title: "Emma", author: "Jane Austen", text: "Badly done." })
      ],
      { date, timeZone: "UTC" }
    );

    expect(text).toBe(
      [
        "Your Daily Highlights - January 05, 2024",
        '[Productivity] "Focus is the new IQ."\n  - Deep Work by Cal Newport',
        '"Badly done."\n  - Emma by Jane Austen'
      ].join("\n\n")
    );
  });

  it("does not modify the selection", () => {
    const selection = [makeHighlight()];
    renderDigest(selection, { date, timeZone: "UTC" });

    expect(selection).toEqual([makeHighlight()]);
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;"
    );
  });
});
