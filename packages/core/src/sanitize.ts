const URL_PATTERN = /https?:\/\/\S+/g;

export function redactUrls(text: string): string {
  return text.replace(URL_PATTERN, "[URL]");
}
