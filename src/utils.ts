export type IdGenerator = {
  next(): string;
};

/** Monotonic counter ids: "1", "2", ... */
export class SimpleIdGenerator implements IdGenerator {
  private counter: number;
  private readonly prefix: string;

  constructor(options: { start?: number; prefix?: string } = {}) {
    this.counter = options.start ?? 0;
    this.prefix = options.prefix ?? "";
  }

  next(): string {
    this.counter += 1;
    return `${this.prefix}${this.counter}`;
  }
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}
