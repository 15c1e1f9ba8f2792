import type { Message, MessageRole } from "./types";

export interface FormatHistoryOptions {
  /** Only the most recent `window` messages are rendered. */
  window?: number;
}

/**
 * Append-only, ordered record of the conversation. Messages are frozen on
 * append; there is no way to edit or remove one.
 */
export class MessageLog {
  private messages: Message[];
  private now: () => Date;

  constructor(messages: readonly Message[] = [], now: () => Date = () => new Date()) {
    this.messages = messages.map((m) => Object.freeze({ ...m }));
    this.now = now;
  }

  append(role: MessageRole, content: string): Message {
    const message: Message = Object.freeze({
      role,
      content,
      timestamp: this.now().toISOString(),
    });
    this.messages.push(message);
    return message;
  }

  /** Get all messages in order */
  getMessages(): Message[] {
    return [...this.messages];
  }

  getMessageCount(): number {
    return this.messages.length;
  }

  formatForPrompt(options: FormatHistoryOptions = {}): string {
    const { window } = options;
    const visible =
      window !== undefined && window < this.messages.length
        ? this.messages.slice(this.messages.length - Math.max(0, window))
        : this.messages;
    if (visible.length === 0) return "No prior messages.";

    return visible
      .map((m) => `[${m.role.toUpperCase()} @ ${m.timestamp}]\n${m.content}`)
      .join("\n\n---\n\n");
  }
}
