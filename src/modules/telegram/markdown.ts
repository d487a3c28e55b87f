// Telegram MarkdownV2 reserved characters, plus the escape character itself.
const MARKDOWN_RESERVED = /[_*[\]()~`>#+\-=|{}.!\\]/g;
const LINK_URL_RESERVED = /[)\\]/g;

export function escapeMarkdown(text: string | number): string {
  return String(text).replace(MARKDOWN_RESERVED, char => `\\${char}`);
}

export function escapeLinkUrl(url: string): string {
  return url.replace(LINK_URL_RESERVED, char => `\\${char}`);
}
