import type { ConversationEntry } from "@gridparley/schemas";

/** Messages spoken to an agent, held until its next prompt is rendered. */
export class Inbox {
  private pending = new Map<string, ConversationEntry[]>();

  deliver(entry: ConversationEntry): void {
    const queue = this.pending.get(entry.to) ?? [];
    queue.push(entry);
    this.pending.set(entry.to, queue);
  }

  peek(agent: string): ConversationEntry[] {
    return [...(this.pending.get(agent) ?? [])];
  }

  take(agent: string): ConversationEntry[] {
    const queue = this.pending.get(agent) ?? [];
    this.pending.delete(agent);
    return queue;
  }
}
