/**
 * Escapes text for use in Telegram HTML messages.
 * Telegram only requires &, < and > to be escaped.
 */
export function escapeTelegramHtml(text: string | null | undefined): string {
  if (!text) return "";
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}
