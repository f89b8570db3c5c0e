import type { DigestDocument, StoredHighlight } from "../types.js";

type DigestItem = Pick<StoredHighlight, "title" | "author" | "text" | "theme">;

// Dates are formatted in the host's local zone unless a zone is given.
function formatDates(date: Date, timeZone?: string): { monthDay: string; fullDate: string } {
  const monthDay = new Intl.DateTimeFormat("en-US", { month: "long", day: "numeric", timeZone });
  const fullDate = new Intl.DateTimeFormat("en-US", {
    month: "long",
    day: "2-digit",
    year: "numeric",
    timeZone
  });
  return { monthDay: monthDay.format(date), fullDate: fullDate.format(date) };
}

const STYLES = `
    body { font-family: Georgia, 'Times New Roman', serif; line-height: 1.6; max-width: 600px; margin: 0 auto; padding: 20px; background-color: #fafafa; color: #333; }
    .header { text-align: center; padding-bottom: 20px; border-bottom: 2px solid #e0e0e0; margin-bottom: 30px; }
    .header h1 { font-size: 24px; color: #2c3e50; margin: 0; }
    .header p { color: #7f8c8d; margin: 5px 0 0 0; font-size: 14px; }
    .highlight { background: white; border-left: 4px solid #3498db; padding: 20px; margin-bottom: 25px; box-shadow: 0 1px 3px rgba(0,0,0,0.1); }
    .highlight-text { font-size: 16px; font-style: italic; color: #2c3e50; margin: 0 0 15px 0; }
    .highlight-source { font-size: 13px; color: #7f8c8d; margin: 0; }
    .highlight-source strong { color: #34495e; }
    .highlight-theme { font-size: 11px; text-transform: uppercase; letter-spacing: 1px; color: #3498db; margin: 0 0 8px 0; }
    .footer { text-align: center; padding-top: 20px; border-top: 1px solid #e0e0e0; font-size: 12px; color: #95a5a6; }`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function renderItemHtml(item: DigestItem): string {
  const text = escapeHtml(item.text).split("\n").join("<br>");
  const theme = item.theme
    ? `\n    <p class="highlight-theme">${escapeHtml(item.theme)}</p>`
    : "";
  return [
    `  <div class="highlight">${theme}`,
    `    <p class="highlight-text">&ldquo;${text}&rdquo;</p>`,
    `    <p class="highlight-source">&mdash; <strong>${escapeHtml(item.title)}</strong> by ${escapeHtml(item.author)}</p>`,
    "  </div>"
  ].join("\n");
}

function renderItemText(item: DigestItem): string {
  const label = item.theme ? `[${item.theme}] ` : "";
  return `${label}"${item.text}"\n  - ${item.title} by ${item.author}`;
}

export function renderDigest(
  selection: readonly DigestItem[],
  options: { date?: Date; timeZone?: string } = {}
): DigestDocument {
  const date = options.date ?? new Date();
  const { monthDay, fullDate } = formatDates(date, options.timeZone);
  const subject = `Your Daily Kindle Highlights - ${monthDay}`;
  const body = selection.map(renderItemHtml).join("\n");

  const html = [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '  <meta charset="utf-8">',
    `  <style>${STYLES}\n  </style>`,
    "</head>",
    "<body>",
    '  <div class="header">',
    "    <h1>Your Daily Highlights</h1>",
    `    <p>${fullDate}</p>`,
    "  </div>",
    ...(body ? [body] : []),
    '  <div class="footer">',
    "    <p>Powered by your personal Kindle Highlights system</p>",
    "  </div>",
    "</body>",
    "</html>",
    ""
  ].join("\n");

  const text = [
    `Your Daily Highlights - ${fullDate}`,
    ...selection.map(renderItemText)
  ].join("\n\n");

  return { subject, html, text };
}
