/**
 * Port: Conversation
 * The host authentication boundary — how a prompt reaches the user.
 */
export interface PromptOptions {
  /** Suppress echo of the typed characters. */
  readonly masked: boolean;
}

export interface Conversation {
  /** Resolve the entered line, or null when the user gave no response. */
  prompt(message: string, options: PromptOptions): Promise<string | null>;
  info(message: string): void;
  error(message: string): void;
}
