/** Speaker identity of the synthetic originator turn. */
export const TASK_SPEAKER = "task";

/**
 * One message as an agent sees it. A Turn is a ChatMessage, so a transcript
 * can be handed to an agent as-is.
 */
export type ChatMessage = {
  speaker: string;
  content: string;
};

export type Turn = ChatMessage & {
  /** Position in the run, starting at 0 */
  index: number;
  timestamp: string;
};

/**
 * Append-only transcript of one pipeline run.
 * Turns are frozen on append; there is no way to reorder or remove them.
 */
export class Conversation {
  private readonly entries: Turn[] = [];
  private readonly clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  append(speaker: string, content: string): Turn {
    const turn: Turn = Object.freeze({
      index: this.entries.length,
      speaker,
      content,
      timestamp: this.clock().toISOString()
    });
    this.entries.push(turn);
    return turn;
  }

  /** Read-only view over the live transcript. */
  get turns(): readonly Turn[] {
    return this.entries;
  }

  last(): Turn | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Independent copy, safe to hand to callers after the run ends. */
  snapshot(): Turn[] {
    return [...this.entries];
  }
}

/**
 * Fold a finished transcript and a follow-up message into one task string.
 * Callers that keep a chat going across runs use this to carry history forward.
 */
export function composeFollowUpTask(history: readonly ChatMessage[], message: string): string {
  if (history.length === 0) return message;
  const lines = history.map((m) => `${m.speaker}: ${m.content}`);
  return `Conversation so far:\n${lines.join("\n")}\n\nNew message:\n${message}`;
}
