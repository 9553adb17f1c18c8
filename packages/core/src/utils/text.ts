export function collapseLineBreaks(text: string): string {
  return text.replace(/\r\n|\r|\n/g, " ");
}

export function unwrapQuotes(text: string, quote = '"'): string {
  if (text.length >= 2 && text.startsWith(quote) && text.endsWith(quote)) {
    return text.slice(1, -1).trim();
  }
  return text;
}

export function firstDigitRun(text: string): string | null {
  const match = text.match(/\d+/);
  return match ? match[0] : null;
}
