export function approximateTokenCount(text: string): number {
  if (!text) {
    return 0;
  }
  return Math.ceil(text.length / 4);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  return `${text.slice(0, maxLength - 1)}…`;
}

export function tokenize(text: string): string[] {
  return collapseWhitespace(text.toLowerCase().replace(/[^\p{L}\p{N}\s]+/gu, ' '))
    .split(' ')
    .filter((word) => word.length > 0);
}
